import { Module } from '@nestjs/common';
import { BookingsModule } from '../bookings/bookings.module';
import { CommonModule } from '../common/common.module';
import { BookingDddModule } from '../modules/booking/booking-ddd.module';
import { ViewsModule } from '../views/views.module';
import { PaymentsController } from './payments.controller';
import { PaymentsService } from './payments.service';

@Module({
  imports: [CommonModule, BookingDddModule, BookingsModule, ViewsModule],
  controllers: [PaymentsController],
  providers: [PaymentsService],
})
export class PaymentsModule { }
