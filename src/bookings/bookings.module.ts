import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { BookingDddModule } from '../modules/booking/booking-ddd.module';
import { ScheduleDddModule } from '../modules/schedule/schedule-ddd.module';
import { SchedulesModule } from '../schedules/schedules.module';
import { ViewsModule } from '../views/views.module';
import { BookingsController } from './bookings.controller';
import { BookingsService } from './bookings.service';

@Module({
  imports: [CommonModule, BookingDddModule, ScheduleDddModule, SchedulesModule, ViewsModule],
  controllers: [BookingsController],
  providers: [BookingsService],
  exports: [BookingsService],
})
export class BookingsModule { }
