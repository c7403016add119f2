import type {
    BookingDetails,
    CreateBookingResult,
    NewBooking,
    PaymentAttempt,
    RecordPaymentResult,
} from '../../../../bookings/entities/booking.entity';

export const BOOKING_REPOSITORY = Symbol('BOOKING_REPOSITORY');

export interface IBookingRepository {
    /**
     * Decrements the schedule's seats and stores the booking with its passengers,
     * all or nothing. Seats are only taken when enough are left.
     */
    createPending(booking: NewBooking): Promise<CreateBookingResult>;
    findByPnr(pnr: string): Promise<BookingDetails | null>;
    /** Locks the booking, moves its status and appends a payment ledger row. */
    recordPayment(attempt: PaymentAttempt): Promise<RecordPaymentResult>;
}
