import { Injectable } from '@nestjs/common';
import { Registry, collectDefaultMetrics, Counter, Histogram, Gauge } from 'prom-client';

export type BusinessEventStatus = 'success' | 'failure';

@Injectable()
export class MetricsService {
  private readonly registry = new Registry();
  private readonly httpRequestsTotal: Counter<string>;
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestsInFlight: Gauge<string>;
  private readonly businessEventsTotal: Counter<string>;
  private readonly seatsBookedTotal: Counter<string>;

  constructor() {
    if (process.env.NODE_ENV !== 'test') {
      collectDefaultMetrics({ register: this.registry });
    }

    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.05, 0.1, 0.3, 0.5, 1, 3, 5],
      registers: [this.registry],
    });

    this.httpRequestsInFlight = new Gauge({
      name: 'http_requests_in_flight',
      help: 'Number of HTTP requests currently being processed',
      registers: [this.registry],
    });

    this.businessEventsTotal = new Counter({
      name: 'business_events_total',
      help: 'Total number of business events',
      labelNames: ['event_type', 'status'],
      registers: [this.registry],
    });

    this.seatsBookedTotal = new Counter({
      name: 'seats_booked_total',
      help: 'Seats taken out of schedule inventory by bookings',
      registers: [this.registry],
    });
  }

  incrementHttpRequests(method: string, route: string, statusCode: number): void {
    this.httpRequestsTotal.labels(method, route, statusCode.toString()).inc();
  }

  recordHttpRequestDuration(method: string, route: string, statusCode: number, durationMs: number): void {
    this.httpRequestDuration
      .labels(method, route, statusCode.toString())
      .observe(durationMs / 1000);
  }

  incrementHttpRequestsInFlight(): void {
    this.httpRequestsInFlight.inc();
  }

  decrementHttpRequestsInFlight(): void {
    this.httpRequestsInFlight.dec();
  }

  recordBusinessEvent(eventType: string, status: BusinessEventStatus): void {
    this.businessEventsTotal.labels(eventType, status).inc();
  }

  recordSeatsBooked(count: number): void {
    this.seatsBookedTotal.inc(count);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
