import 'reflect-metadata';
import { Test } from '@nestjs/testing';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { DATABASE_CLIENT } from '../src/database/database.module';
import { BOOKING_REPOSITORY } from '../src/modules/booking/domain/repositories/booking.repository.interface';
import { SCHEDULE_REPOSITORY } from '../src/modules/schedule/domain/repositories/schedule.repository.interface';
import { PAYMENT_DECLINED_MESSAGE } from '../src/payments/payments.service';
import { InMemoryRailStore } from './support/in-memory-rail.store';

const FORM = { 'content-type': 'application/x-www-form-urlencoded' };

const twoPassengerForm = [
  'scheduleId=1',
  'coachTypeId=1',
  'email=traveller%40example.com',
  'passengerName=Asha+Rao',
  'passengerName=Vikram+Rao',
  'passengerAge=34',
  'passengerAge=36',
  'seatPreference=window',
  'seatPreference=aisle',
].join('&');

describe('Booking flow (HTTP)', () => {
  let app: NestFastifyApplication;
  let store: InMemoryRailStore;
  const db = { query: jest.fn() };

  const start = async (seeded: InMemoryRailStore): Promise<void> => {
    store = seeded;
    db.query.mockResolvedValue({ rows: [{ '?column?': 1 }] });

    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(DATABASE_CLIENT)
      .useValue(db)
      .overrideProvider(SCHEDULE_REPOSITORY)
      .useValue(store)
      .overrideProvider(BOOKING_REPOSITORY)
      .useValue(store)
      .compile();

    app = moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), { logger: false });
    await configureApp(app);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  };

  const book = (payload: string) =>
    app.inject({ method: 'POST', url: '/book', headers: FORM, payload });

  const pay = (pnr: string, cardNumber: string) =>
    app.inject({
      method: 'POST',
      url: '/pay',
      headers: FORM,
      payload: `pnr=${pnr}&cardNumber=${encodeURIComponent(cardNumber)}`,
    });

  const pnrFrom = (location: unknown): string => {
    const match = /^\/payment\/(PNR\d{4}[A-Z0-9]{5})$/.exec(String(location));
    if (!match) throw new Error(`unexpected redirect to ${String(location)}`);
    return match[1];
  };

  afterEach(async () => {
    await app.close();
  });

  describe('with free seats', () => {
    beforeEach(() => start(InMemoryRailStore.seeded({ totalSeats: 50, seatsAvailable: 50 })));

    it('renders the search form with every station', async () => {
      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('<option value="1">New Delhi (NDLS)</option>');
      expect(response.headers['x-request-id']).toEqual(expect.any(String));
    });

    it('echoes a caller supplied request id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/',
        headers: { 'x-request-id': 'test-request-1' },
      });

      expect(response.headers['x-request-id']).toBe('test-request-1');
    });

    it('lists trains for a route and date', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/search',
        headers: FORM,
        payload: 'source=1&destination=2&date=2026-10-20',
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('New Delhi to Bhopal Junction');
      expect(response.body).toContain('<strong>12001</strong> New Delhi - Bhopal Shatabdi');
    });

    it('refuses a search from a station to itself', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/search',
        headers: FORM,
        payload: 'source=1&destination=1&date=2026-10-20',
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain('Source and destination must be different stations');
    });

    it('books, pays and issues a ticket', async () => {
      const booked = await book(twoPassengerForm);

      expect(booked.statusCode).toBe(303);
      const pnr = pnrFrom(booked.headers.location);
      expect(store.seatsAvailable(1)).toBe(48);
      expect(store.bookings[0].status).toBe('payment_pending');

      const paymentPage = await app.inject({ method: 'GET', url: `/payment/${pnr}` });
      expect(paymentPage.statusCode).toBe(200);
      expect(paymentPage.body).toContain(`<input type="hidden" name="pnr" value="${pnr}">`);

      const paid = await pay(pnr, '4242 4242 4242 4242');
      expect(paid.statusCode).toBe(303);
      expect(paid.headers.location).toBe(`/ticket/${pnr}`);
      expect(store.bookings[0].status).toBe('confirmed');

      const ticket = await app.inject({ method: 'GET', url: `/ticket/${pnr}` });
      expect(ticket.statusCode).toBe(200);
      expect(ticket.body).toContain(`PNR <strong>${pnr}</strong>`);
    });

    it('keeps the booking open for a retry after a declined card', async () => {
      const pnr = pnrFrom((await book(twoPassengerForm)).headers.location);

      const declined = await pay(pnr, '4111111111111111');

      expect(declined.statusCode).toBe(402);
      expect(declined.body).toContain(PAYMENT_DECLINED_MESSAGE);
      expect(store.bookings[0].status).toBe('payment_failed');
      expect(store.seatsAvailable(1)).toBe(48);

      const retried = await pay(pnr, '4111111111111112');
      expect(retried.statusCode).toBe(303);
    });

    it('refuses to take a second payment', async () => {
      const pnr = pnrFrom((await book(twoPassengerForm)).headers.location);
      await pay(pnr, '2222');

      const again = await pay(pnr, '2222');

      expect(again.statusCode).toBe(409);
      expect(store.payments).toHaveLength(1);
    });

    it('rejects an out of range passenger age', async () => {
      const response = await book(twoPassengerForm.replace('passengerAge=36', 'passengerAge=200'));

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain('Passenger ages must be between 0 and 120');
      expect(store.seatsAvailable(1)).toBe(50);
    });

    it('refuses ids beyond the integer column range before reaching the repositories', async () => {
      const findById = jest.spyOn(store, 'findById');
      const findCoachType = jest.spyOn(store, 'findCoachType');

      const form = await app.inject({ method: 'GET', url: '/book/99999999999' });
      const booked = await book(twoPassengerForm.replace('coachTypeId=1', 'coachTypeId=99999999999'));

      expect(form.statusCode).toBe(400);
      expect(booked.statusCode).toBe(400);
      expect(booked.body).toContain('Choose a coach class');
      expect(findById).not.toHaveBeenCalled();
      expect(findCoachType).not.toHaveBeenCalled();
      expect(store.seatsAvailable(1)).toBe(50);
    });

    it('answers unknown PNRs with 404 JSON when asked for JSON', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/ticket/unknown',
        headers: { accept: 'application/json' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ code: 'NOT_FOUND', message: 'Booking not found' });
    });

    it('exposes Prometheus metrics in the text exposition format', async () => {
      await book(twoPassengerForm);

      const response = await app.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/plain; version=0.0.4; charset=utf-8');
      expect(response.body).toContain('seats_booked_total 2');
    });

    it('reports health', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'healthy', service: 'rail-reservations' });
      expect(db.query).toHaveBeenCalledWith('SELECT 1');
    });
  });

  describe('with two seats left', () => {
    beforeEach(() => start(InMemoryRailStore.seeded({ totalSeats: 50, seatsAvailable: 2 })));

    it('re-renders the passenger form with 409 and keeps the seats', async () => {
      const names = ['A', 'B', 'C', 'D', 'E'];
      const payload = [
        'scheduleId=1',
        'coachTypeId=1',
        ...names.map(name => `passengerName=${name}`),
        ...names.map((_, index) => `passengerAge=${30 + index}`),
        ...names.map(() => 'seatPreference=no_preference'),
      ].join('&');

      const response = await book(payload);

      expect(response.statusCode).toBe(409);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('Only 2 seat(s) left, but 5 were requested');
      expect(store.seatsAvailable(1)).toBe(2);
      expect(store.bookings).toHaveLength(0);
    });
  });
});
