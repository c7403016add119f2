import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ParseIdPipe } from '../common/pipes/parse-id.pipe';
import { ThrottlePayment } from '../common/decorators/throttle.decorator';
import { SchedulesService } from '../schedules/schedules.service';
import { ViewsService } from '../views/views.service';
import { SEAT_PREFERENCE_LABELS } from '../views/view-helpers';
import { BookingsService } from './bookings.service';
import { BookingFormQueryDto } from './dto/booking-form-query.dto';
import { CreateBookingDto } from './dto/create-booking.dto';
import { SEAT_PREFERENCES } from './entities/booking.entity';
import { InsufficientSeatsException } from './exceptions/insufficient-seats.exception';

interface PassengerRow {
  name: string;
  age: number | string;
  seatPreference: string;
}

interface PassengerFormState {
  scheduleId: number;
  passengers: PassengerRow[];
  selectedCoachTypeId?: number;
  email?: string;
  error?: string;
}

const SEAT_PREFERENCE_OPTIONS = SEAT_PREFERENCES.map(value => ({
  value,
  label: SEAT_PREFERENCE_LABELS[value],
}));

@Controller()
export class BookingsController {
  constructor(
    private readonly bookingsService: BookingsService,
    private readonly schedulesService: SchedulesService,
    private readonly views: ViewsService,
  ) { }

  @Get('book/:scheduleId')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async passengerForm(
    @Param('scheduleId', ParseIdPipe) scheduleId: number,
    @Query() query: BookingFormQueryDto,
  ): Promise<string> {
    const count = query.count ?? 1;
    const maxPassengers = this.schedulesService.passengerCountOptions().length;

    if (count > maxPassengers) {
      throw new BadRequestException(`A booking can hold at most ${maxPassengers} passengers`);
    }

    return this.renderPassengerForm({
      scheduleId,
      passengers: Array.from({ length: count }, () => ({ name: '', age: '', seatPreference: 'no_preference' })),
    });
  }

  @Post('book')
  @ThrottlePayment()
  async createBooking(@Body() dto: CreateBookingDto, @Res() reply: FastifyReply): Promise<void> {
    try {
      const { booking } = await this.bookingsService.createBooking(dto);
      reply.status(HttpStatus.SEE_OTHER).redirect(`/payment/${booking.pnr}`);
    } catch (error) {
      if (!(error instanceof InsufficientSeatsException)) {
        throw error;
      }

      const html = await this.renderPassengerForm({
        scheduleId: dto.scheduleId,
        selectedCoachTypeId: dto.coachTypeId,
        email: dto.email,
        error: error.message,
        passengers: dto.passengerName.map((name, index) => ({
          name,
          age: dto.passengerAge[index],
          seatPreference: dto.seatPreference[index],
        })),
      });

      reply.status(HttpStatus.CONFLICT).type('text/html; charset=utf-8').send(html);
    }
  }

  private async renderPassengerForm(state: PassengerFormState): Promise<string> {
    const [schedule, coachTypes] = await Promise.all([
      this.schedulesService.getSchedule(state.scheduleId),
      this.schedulesService.listCoachTypes(),
    ]);

    return this.views.render('booking', {
      schedule,
      coachTypes,
      passengers: state.passengers,
      count: state.passengers.length,
      passengerOptions: this.schedulesService.passengerCountOptions(),
      seatPreferences: SEAT_PREFERENCE_OPTIONS,
      selectedCoachTypeId: state.selectedCoachTypeId ?? coachTypes[0]?.id,
      email: state.email,
      error: state.error,
    });
  }
}
