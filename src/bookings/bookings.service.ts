import {
  BadRequestException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolveBookingConfig } from '../common/config/booking.config';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { PnrPolicy } from '../modules/booking/domain/policies/pnr.policy';
import { FareCalculation } from '../modules/booking/domain/value-objects/fare-calculation.vo';
import { SeatAllocationPolicy } from '../modules/booking/domain/policies/seat-allocation.policy';
import {
  BOOKING_REPOSITORY,
  IBookingRepository,
} from '../modules/booking/domain/repositories/booking.repository.interface';
import {
  IScheduleRepository,
  SCHEDULE_REPOSITORY,
} from '../modules/schedule/domain/repositories/schedule.repository.interface';
import type { CreateBookingDto } from './dto/create-booking.dto';
import type { Booking, BookingDetails, PassengerDetails } from './entities/booking.entity';
import { InsufficientSeatsException } from './exceptions/insufficient-seats.exception';

export interface CreatedBooking {
  booking: Booking;
  seatsAvailable: number;
}

@Injectable()
export class BookingsService {
  constructor(
    @Inject(BOOKING_REPOSITORY) private readonly bookings: IBookingRepository,
    @Inject(SCHEDULE_REPOSITORY) private readonly schedules: IScheduleRepository,
    private readonly configService: ConfigService,
    private readonly logger: CustomLoggerService,
    private readonly metrics: MetricsService,
  ) { }

  /**
   * Takes the seats and stores the booking as `payment_pending`.
   * Throws `InsufficientSeatsException` (409) when the train cannot seat everyone;
   * in that case no seats are taken.
   */
  async createBooking(dto: CreateBookingDto): Promise<CreatedBooking> {
    const passengers = this.collectPassengers(dto);
    const { maxPassengersPerBooking } = resolveBookingConfig(this.configService);
    const countCheck = SeatAllocationPolicy.validatePassengerCount(passengers.length, maxPassengersPerBooking);

    if (!countCheck.valid) {
      throw new BadRequestException(countCheck.error);
    }

    const coachType = await this.schedules.findCoachType(dto.coachTypeId);
    if (!coachType) {
      throw new NotFoundException('Coach type not found');
    }

    const fare = FareCalculation.calculate({
      baseFareCents: coachType.baseFareCents,
      fareMultiplier: coachType.fareMultiplier,
      passengerCount: passengers.length,
    });

    const result = await this.bookings.createPending({
      scheduleId: dto.scheduleId,
      coachTypeId: coachType.id,
      email: dto.email ?? null,
      passengers,
      totalFareCents: fare.totalCents,
      pnrFor: (bookingId) => PnrPolicy.generate(bookingId),
    });

    switch (result.outcome) {
      case 'schedule_not_found':
        throw new NotFoundException('Schedule not found');

      case 'insufficient_seats':
        this.logger.logBusinessEvent('booking_rejected', {
          scheduleId: dto.scheduleId,
          requested: passengers.length,
          seatsAvailable: result.seatsAvailable,
        });
        this.metrics.recordBusinessEvent('booking_created', 'failure');
        throw new InsufficientSeatsException(passengers.length, result.seatsAvailable);

      case 'created':
        this.logger.logBusinessEvent('booking_created', {
          bookingId: result.booking.id,
          pnr: result.booking.pnr,
          scheduleId: result.booking.scheduleId,
          passengers: result.booking.passengerCount,
          farePerPassengerCents: fare.farePerPassengerCents,
          totalFareCents: result.booking.totalFareCents,
          seatsAvailable: result.seatsAvailable,
        });
        this.metrics.recordBusinessEvent('booking_created', 'success');
        this.metrics.recordSeatsBooked(result.booking.passengerCount);
        return { booking: result.booking, seatsAvailable: result.seatsAvailable };
    }
  }

  async getBooking(pnr: string): Promise<BookingDetails> {
    const normalized = PnrPolicy.normalize(pnr);
    const booking = PnrPolicy.isWellFormed(normalized)
      ? await this.bookings.findByPnr(normalized)
      : null;

    if (!booking) {
      throw new NotFoundException('Booking not found');
    }

    return booking;
  }

  private collectPassengers(dto: CreateBookingDto): PassengerDetails[] {
    const count = dto.passengerName.length;

    if (dto.passengerAge.length !== count || dto.seatPreference.length !== count) {
      throw new BadRequestException('Each passenger needs a name, an age and a seat preference');
    }

    return dto.passengerName.map((name, index) => ({
      name,
      age: dto.passengerAge[index],
      seatPreference: dto.seatPreference[index],
    }));
  }
}
