import type { AvailabilityLevel } from '../schedules/entities/schedule.entity';
import type { BookingStatus, SeatPreference } from '../bookings/entities/booking.entity';

const rupees = new Intl.NumberFormat('en-IN', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(cents: number): string {
  return `₹${rupees.format(cents / 100)}`;
}

const AVAILABILITY_LABELS: Record<AvailabilityLevel, string> = {
  available: 'Available',
  limited: 'Filling fast',
  sold_out: 'Sold out',
};

const STATUS_LABELS: Record<BookingStatus, string> = {
  created: 'Created',
  payment_pending: 'Awaiting payment',
  confirmed: 'Confirmed',
  payment_failed: 'Payment failed',
};

export const SEAT_PREFERENCE_LABELS: Record<SeatPreference, string> = {
  no_preference: 'No preference',
  window: 'Window',
  aisle: 'Aisle',
  lower: 'Lower berth',
  middle: 'Middle berth',
  upper: 'Upper berth',
};

function labelFrom(labels: Readonly<Record<string, string>>, value: unknown): string {
  if (typeof value === 'string' && Object.prototype.hasOwnProperty.call(labels, value)) {
    return labels[value];
  }
  return String(value ?? '');
}

export const availabilityLabel = (value: unknown): string => labelFrom(AVAILABILITY_LABELS, value);
export const statusLabel = (value: unknown): string => labelFrom(STATUS_LABELS, value);
export const seatPreferenceLabel = (value: unknown): string => labelFrom(SEAT_PREFERENCE_LABELS, value);
