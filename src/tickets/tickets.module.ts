import { Module } from '@nestjs/common';
import { BookingsModule } from '../bookings/bookings.module';
import { ViewsModule } from '../views/views.module';
import { TicketsController } from './tickets.controller';
import { TicketsService } from './tickets.service';

@Module({
  imports: [BookingsModule, ViewsModule],
  controllers: [TicketsController],
  providers: [TicketsService],
})
export class TicketsModule { }
