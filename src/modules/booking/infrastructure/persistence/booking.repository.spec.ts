import { Pool, QueryResultRow } from 'pg';
import { DatabaseClient } from '../../../../database/database.client';
import { DatabaseConfig } from '../../../../database/database.config';
import { ScriptedPg } from '../../../../../test/support/scripted-pg';
import { PnrPolicy } from '../../domain/policies/pnr.policy';
import { BookingRepository } from './booking.repository';

jest.mock('pg', () => ({
    Pool: jest.fn(),
}));

const bookedAt = new Date('2026-10-19T08:00:00.000Z');

function bookingRow(overrides: Partial<QueryResultRow> = {}): QueryResultRow {
    return {
        id: 7,
        pnr: 'PNR0007AAAAA',
        schedule_id: 11,
        coach_type_id: 1,
        email: null,
        status: 'payment_pending',
        passenger_count: 2,
        total_fare_cents: 90_000,
        created_at: bookedAt,
        updated_at: bookedAt,
        ...overrides,
    };
}

describe('BookingRepository', () => {
    let pg: ScriptedPg;
    let db: DatabaseClient;
    let repository: BookingRepository;

    beforeEach(async () => {
        pg = new ScriptedPg();
        jest.mocked(Pool).mockImplementation(() => pg.pool as unknown as Pool);
        db = await DatabaseClient.initialize(DatabaseConfig.fromEnv({}));
        pg.clearStatements();
        repository = new BookingRepository(db);
    });

    afterEach(async () => {
        await db.disconnect();
    });

    describe('createPending', () => {
        const newBooking = {
            scheduleId: 11,
            coachTypeId: 1,
            email: null,
            passengers: [
                { name: 'Asha', age: 34, seatPreference: 'window' as const },
                { name: 'Ravi', age: 36, seatPreference: 'aisle' as const },
            ],
            totalFareCents: 90_000,
            pnrFor: (id: number) => PnrPolicy.generate(id, () => 0),
        };

        it('takes the seats and stores the booking with numbered passengers', async () => {
            pg.respond(/UPDATE schedules/, [{ seats_before: 50, seats_available: 48 }])
                .respond(/nextval/, [{ id: 7 }])
                .respond(/INSERT INTO bookings/, values => [bookingRow({
                    id: values[0],
                    pnr: values[1],
                    status: values[5],
                    total_fare_cents: values[7],
                })]);

            const result = await repository.createPending(newBooking);

            expect(result).toEqual({
                outcome: 'created',
                seatsAvailable: 48,
                booking: {
                    id: 7,
                    pnr: 'PNR0007AAAAA',
                    scheduleId: 11,
                    coachTypeId: 1,
                    email: null,
                    status: 'payment_pending',
                    passengerCount: 2,
                    totalFareCents: 90_000,
                    createdAt: bookedAt,
                    updatedAt: bookedAt,
                },
            });
            expect(pg.statements[1].values).toEqual([11, 2]);
            expect(pg.statements[4].values).toEqual([
                7, 'Asha', 34, 'window', 'S050',
                7, 'Ravi', 36, 'aisle', 'S049',
            ]);
            expect(pg.texts().at(-1)).toBe('COMMIT');
        });

        it('decrements seats with a guarded update before any insert, inside one transaction', async () => {
            pg.respond(/UPDATE schedules/, [{ seats_before: 50, seats_available: 48 }])
                .respond(/nextval/, [{ id: 7 }])
                .respond(/INSERT INTO bookings/, [bookingRow()]);

            await repository.createPending(newBooking);

            const texts = pg.texts();
            expect(texts[0]).toBe('BEGIN');
            expect(texts[1]).toMatch(/^UPDATE schedules SET seats_available = seats_available - \$2::int WHERE id = \$1 AND seats_available >= \$2::int RETURNING /);
            expect(texts[2]).toContain('nextval');
            expect(texts[3]).toMatch(/^INSERT INTO bookings/);
            expect(texts[4]).toMatch(/^INSERT INTO passengers/);
            expect(texts[5]).toBe('COMMIT');
            expect(texts).toHaveLength(6);
            expect(pg.statements[3].values[7]).toBe(90_000);
        });

        it('reports insufficient seats without writing anything', async () => {
            pg.respond(/SELECT seats_available FROM schedules/, [{ seats_available: 2 }]);

            const result = await repository.createPending({
                ...newBooking,
                passengers: Array.from({ length: 5 }, (_, i) => ({
                    name: `Passenger ${i + 1}`,
                    age: 30,
                    seatPreference: 'no_preference' as const,
                })),
            });

            expect(result).toEqual({ outcome: 'insufficient_seats', seatsAvailable: 2 });
            expect(pg.texts().some(text => text.startsWith('INSERT'))).toBe(false);
        });

        it('reports a missing schedule', async () => {
            await expect(repository.createPending(newBooking)).resolves.toEqual({
                outcome: 'schedule_not_found',
            });
        });

        it('rolls back when an insert fails', async () => {
            pg.respond(/UPDATE schedules/, [{ seats_before: 50, seats_available: 48 }])
                .respond(/nextval/, [{ id: 7 }])
                .respond(/INSERT INTO bookings/, () => {
                    throw new Error('duplicate key value violates unique constraint');
                });

            await expect(repository.createPending(newBooking)).rejects.toThrow('duplicate key value');
            expect(pg.texts().at(-1)).toBe('ROLLBACK');
        });
    });

    describe('recordPayment', () => {
        const attempt = { pnr: 'PNR0007AAAAA', approved: true, method: 'CARD' as const, cardLast4: '1114' };

        it('confirms the booking and writes a ledger row', async () => {
            pg.respond(/FOR UPDATE/, [bookingRow()]);

            await expect(repository.recordPayment(attempt)).resolves.toEqual({
                outcome: 'recorded',
                bookingId: 7,
                status: 'confirmed',
                amountCents: 90_000,
            });

            const update = pg.statements.find(s => s.text.startsWith('UPDATE bookings'));
            const ledger = pg.statements.find(s => s.text.includes('INSERT INTO payments'));
            expect(update?.values).toEqual([7, 'confirmed']);
            expect(ledger?.values).toEqual([7, 90_000, 'success', 'CARD', '1114']);
        });

        it('marks a declined attempt as failed', async () => {
            pg.respond(/FOR UPDATE/, [bookingRow()]);

            const result = await repository.recordPayment({ ...attempt, approved: false, cardLast4: '1117' });

            expect(result).toEqual({ outcome: 'recorded', bookingId: 7, status: 'payment_failed', amountCents: 90_000 });
            const ledger = pg.statements.find(s => s.text.includes('INSERT INTO payments'));
            expect(ledger?.values).toEqual([7, 90_000, 'failed', 'CARD', '1117']);
        });

        it('leaves a confirmed booking alone', async () => {
            pg.respond(/FOR UPDATE/, [bookingRow({ status: 'confirmed' })]);

            await expect(repository.recordPayment(attempt)).resolves.toEqual({ outcome: 'already_confirmed' });
            expect(pg.texts().some(text => text.startsWith('UPDATE bookings'))).toBe(false);
        });

        it('reports an unknown PNR', async () => {
            await expect(repository.recordPayment(attempt)).resolves.toEqual({ outcome: 'booking_not_found' });
        });
    });

    describe('findByPnr', () => {
        it('assembles the schedule, coach type and passengers', async () => {
            pg.respond(/FROM bookings WHERE pnr/, [bookingRow({ status: 'confirmed' })])
                .respond(/FROM schedules s/, [{
                    id: 11,
                    train_id: 1,
                    train_number: '12001',
                    train_name: 'New Delhi - Bhopal Shatabdi',
                    source_id: 1,
                    source_code: 'NDLS',
                    source_name: 'New Delhi',
                    destination_id: 3,
                    destination_code: 'BPL',
                    destination_name: 'Bhopal Junction',
                    travel_date: '2026-10-20',
                    departure_time: '06:00',
                    arrival_time: '12:30',
                    total_seats: 50,
                    seats_available: 48,
                }])
                .respond(/FROM coach_types WHERE id/, [
                    { id: 1, code: 'SL', name: 'Sleeper', base_fare_cents: 45_000, fare_multiplier: '1.00', description: null },
                ])
                .respond(/FROM passengers/, [
                    { id: 1, name: 'Asha', age: 34, seat_preference: 'window', seat_number: 'S050' },
                    { id: 2, name: 'Ravi', age: 36, seat_preference: 'aisle', seat_number: 'S049' },
                ]);

            const booking = await repository.findByPnr('PNR0007AAAAA');

            expect(booking?.status).toBe('confirmed');
            expect(booking?.schedule.train.number).toBe('12001');
            expect(booking?.coachType.fareCents).toBe(45_000);
            expect(booking?.passengers.map(p => p.seatNumber)).toEqual(['S050', 'S049']);
        });

        it('returns null for an unknown PNR', async () => {
            await expect(repository.findByPnr('PNR9999ZZZZZ')).resolves.toBeNull();
        });
    });
});
