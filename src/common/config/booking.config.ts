import { ConfigService, registerAs } from '@nestjs/config';

export interface BookingConfig {
  maxPassengersPerBooking: number;
  limitedSeatsPercent: number;
}

const DEFAULT_MAX_PASSENGERS = 6;
const DEFAULT_LIMITED_SEATS_PERCENT = 10;

export function loadBookingConfig(env: NodeJS.ProcessEnv = process.env): BookingConfig {
  const maxPassengers = Number(env.BOOKING_MAX_PASSENGERS ?? DEFAULT_MAX_PASSENGERS);

  if (!Number.isInteger(maxPassengers) || maxPassengers <= 0) {
    throw new Error('BOOKING_MAX_PASSENGERS must be a positive integer');
  }

  const limitedSeatsPercent = Number(env.BOOKING_LIMITED_SEATS_PERCENT ?? DEFAULT_LIMITED_SEATS_PERCENT);

  if (!Number.isFinite(limitedSeatsPercent) || limitedSeatsPercent < 0 || limitedSeatsPercent > 100) {
    throw new Error('BOOKING_LIMITED_SEATS_PERCENT must be a number between 0 and 100');
  }

  return {
    maxPassengersPerBooking: maxPassengers,
    limitedSeatsPercent,
  };
}

export default registerAs('booking', (): BookingConfig => loadBookingConfig());

export function resolveBookingConfig(configService: ConfigService): BookingConfig {
  return configService.get<BookingConfig>('booking') ?? loadBookingConfig({});
}
