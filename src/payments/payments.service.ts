import {
  ConflictException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { BookingsService } from '../bookings/bookings.service';
import type { BookingDetails } from '../bookings/entities/booking.entity';
import { CustomLoggerService } from '../common/services/logger.service';
import { MetricsService } from '../common/services/metrics.service';
import {
  BOOKING_REPOSITORY,
  IBookingRepository,
} from '../modules/booking/domain/repositories/booking.repository.interface';
import { PaymentSimulationPolicy } from '../modules/payment/domain/policies/payment-simulation.policy';
import type { PayBookingDto } from './dto/pay-booking.dto';

export const PAYMENT_DECLINED_MESSAGE =
  'Payment declined. Try again with a card number ending in an even digit.';

export type PaymentOutcome =
  | { outcome: 'confirmed'; booking: BookingDetails }
  | { outcome: 'declined'; booking: BookingDetails; message: string }
  | { outcome: 'rejected'; booking: BookingDetails; message: string };

@Injectable()
export class PaymentsService {
  constructor(
    @Inject(BOOKING_REPOSITORY) private readonly bookings: IBookingRepository,
    private readonly bookingsService: BookingsService,
    private readonly logger: CustomLoggerService,
    private readonly metrics: MetricsService,
  ) { }

  /**
   * Simulates a card charge for the booking. A malformed card number is
   * `rejected` without touching the booking; otherwise the attempt is recorded
   * and the booking moves to `confirmed` or `payment_failed`.
   */
  async pay(dto: PayBookingDto): Promise<PaymentOutcome> {
    const booking = await this.bookingsService.getBooking(dto.pnr);

    if (booking.status === 'confirmed') {
      throw new ConflictException('This booking has already been paid');
    }

    const decision = PaymentSimulationPolicy.evaluate(dto.cardNumber);

    if (decision.outcome === 'rejected') {
      this.logger.logBusinessEvent('payment_rejected', {
        pnr: booking.pnr,
        reason: decision.reason,
      });
      return { outcome: 'rejected', booking, message: decision.reason };
    }

    const approved = decision.outcome === 'approved';
    const result = await this.bookings.recordPayment({
      pnr: booking.pnr,
      approved,
      method: 'CARD',
      cardLast4: decision.cardLast4,
    });

    if (result.outcome === 'booking_not_found') {
      throw new NotFoundException('Booking not found');
    }
    if (result.outcome === 'already_confirmed') {
      throw new ConflictException('This booking has already been paid');
    }

    this.logger.logBusinessEvent('payment_recorded', {
      bookingId: result.bookingId,
      pnr: booking.pnr,
      status: result.status,
      amountCents: result.amountCents,
      cardLast4: decision.cardLast4,
    });
    this.metrics.recordBusinessEvent('payment', approved ? 'success' : 'failure');

    const updated = await this.bookingsService.getBooking(booking.pnr);

    return approved
      ? { outcome: 'confirmed', booking: updated }
      : { outcome: 'declined', booking: updated, message: PAYMENT_DECLINED_MESSAGE };
  }
}
