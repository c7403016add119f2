import type { BookingStatus } from '../../../../bookings/entities/booking.entity';

const TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
    created: ['payment_pending'],
    payment_pending: ['confirmed', 'payment_failed'],
    payment_failed: ['confirmed', 'payment_failed'],
    confirmed: [],
};

/**
 * Domain Policy: Booking Status
 * created → payment_pending → confirmed | payment_failed.
 * A failed payment keeps its seats and may be retried; a confirmed booking is final.
 */
export class BookingStatusPolicy {
    static canTransition(from: BookingStatus, to: BookingStatus): boolean {
        return TRANSITIONS[from].includes(to);
    }

    static canAcceptPayment(status: BookingStatus): boolean {
        return BookingStatusPolicy.canTransition(status, 'confirmed');
    }

    static statusAfterPayment(approved: boolean): BookingStatus {
        return approved ? 'confirmed' : 'payment_failed';
    }
}
