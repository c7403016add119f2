import { BookingStatusPolicy } from './booking-status.policy';

describe('BookingStatusPolicy', () => {
  it('follows created → payment_pending → confirmed | payment_failed', () => {
    expect(BookingStatusPolicy.canTransition('created', 'payment_pending')).toBe(true);
    expect(BookingStatusPolicy.canTransition('payment_pending', 'confirmed')).toBe(true);
    expect(BookingStatusPolicy.canTransition('payment_pending', 'payment_failed')).toBe(true);
    expect(BookingStatusPolicy.canTransition('created', 'confirmed')).toBe(false);
  });

  it('lets a failed payment be retried but not a confirmed booking', () => {
    expect(BookingStatusPolicy.canAcceptPayment('payment_failed')).toBe(true);
    expect(BookingStatusPolicy.canAcceptPayment('payment_pending')).toBe(true);
    expect(BookingStatusPolicy.canAcceptPayment('confirmed')).toBe(false);
  });

  it('maps the payment decision to the next status', () => {
    expect(BookingStatusPolicy.statusAfterPayment(true)).toBe('confirmed');
    expect(BookingStatusPolicy.statusAfterPayment(false)).toBe('payment_failed');
  });
});
