import { Injectable } from '@nestjs/common';
import { BookingsService } from '../bookings/bookings.service';
import type { BookingDetails } from '../bookings/entities/booking.entity';

export interface Ticket {
  booking: BookingDetails;
  /** Booking time in UTC, `YYYY-MM-DD HH:MM UTC`. */
  bookedAt: string;
}

@Injectable()
export class TicketsService {
  constructor(private readonly bookingsService: BookingsService) { }

  async getTicket(pnr: string): Promise<Ticket> {
    const booking = await this.bookingsService.getBooking(pnr);
    const iso = booking.createdAt.toISOString();

    return {
      booking,
      bookedAt: `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`,
    };
  }
}
