import { Throttle } from '@nestjs/throttler';

export const ThrottleConfig = {
  // Search and listing endpoints - moderate limits
  SEARCH: { default: { ttl: 60000, limit: 100 } }, // 100 requests per minute

  // Booking and payment endpoints - strict limits
  PAYMENT: { default: { ttl: 60000, limit: 10 } }, // 10 requests per minute

  DEFAULT: { default: { ttl: 60000, limit: 200 } }, // 200 requests per minute
};

export const ThrottleSearch = () => Throttle(ThrottleConfig.SEARCH);
export const ThrottlePayment = () => Throttle(ThrottleConfig.PAYMENT);
