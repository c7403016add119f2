import { Inject, Injectable } from '@nestjs/common';
import { PoolClient } from 'pg';
import { DatabaseClient } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import {
    BookingDetails,
    CreateBookingResult,
    NewBooking,
    PaymentAttempt,
    RecordPaymentResult,
} from '../../../../bookings/entities/booking.entity';
import { SCHEDULE_SELECT } from '../../../schedule/infrastructure/persistence/schedule.repository';
import {
    CoachTypeRow,
    ScheduleMapper,
    ScheduleRow,
} from '../../../schedule/infrastructure/persistence/schedule.mapper';
import { BookingStatusPolicy } from '../../domain/policies/booking-status.policy';
import { SeatAllocationPolicy } from '../../domain/policies/seat-allocation.policy';
import { IBookingRepository } from '../../domain/repositories/booking.repository.interface';
import { BookingMapper, BookingRow, PassengerRow } from './booking.mapper';

const BOOKING_COLUMNS = `
    id, pnr, schedule_id, coach_type_id, email, status,
    passenger_count, total_fare_cents, created_at, updated_at`;

@Injectable()
export class BookingRepository implements IBookingRepository {
    constructor(@Inject(DATABASE_CLIENT) private readonly db: DatabaseClient) { }

    async createPending(booking: NewBooking): Promise<CreateBookingResult> {
        const passengerCount = booking.passengers.length;

        return this.db.transaction(async (client): Promise<CreateBookingResult> => {
            const decrement = await client.query<{ seats_before: number; seats_available: number }>(
                `UPDATE schedules
                SET seats_available = seats_available - $2::int
                WHERE id = $1 AND seats_available >= $2::int
                RETURNING seats_available + $2::int AS seats_before, seats_available`,
                [booking.scheduleId, passengerCount],
            );

            if (decrement.rows.length === 0) {
                return this.explainRejectedDecrement(client, booking.scheduleId);
            }

            const { seats_before: seatsBefore, seats_available: seatsAvailable } = decrement.rows[0];

            const sequence = await client.query<{ id: number }>(
                `SELECT nextval(pg_get_serial_sequence('bookings', 'id'))::int AS id`,
            );
            const bookingId = sequence.rows[0].id;

            const inserted = await client.query<BookingRow>(
                `INSERT INTO bookings (
                    id, pnr, schedule_id, coach_type_id, email, status,
                    passenger_count, total_fare_cents
                ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
                RETURNING ${BOOKING_COLUMNS}`,
                [
                    bookingId,
                    booking.pnrFor(bookingId),
                    booking.scheduleId,
                    booking.coachTypeId,
                    booking.email,
                    'payment_pending',
                    passengerCount,
                    booking.totalFareCents,
                ],
            );

            const seatNumbers = SeatAllocationPolicy.assignSeatNumbers(seatsBefore, passengerCount);
            const values: unknown[] = [];
            const placeholders: string[] = [];
            let paramIndex = 1;

            booking.passengers.forEach((passenger, index) => {
                placeholders.push(
                    `($${paramIndex}, $${paramIndex + 1}, $${paramIndex + 2}, $${paramIndex + 3}, $${paramIndex + 4})`,
                );
                values.push(bookingId, passenger.name, passenger.age, passenger.seatPreference, seatNumbers[index]);
                paramIndex += 5;
            });

            await client.query(
                `INSERT INTO passengers (booking_id, name, age, seat_preference, seat_number)
                VALUES ${placeholders.join(', ')}`,
                values,
            );

            return {
                outcome: 'created',
                booking: BookingMapper.toDomain(inserted.rows[0]),
                seatsAvailable,
            };
        });
    }

    async findByPnr(pnr: string): Promise<BookingDetails | null> {
        const bookingResult = await this.db.query<BookingRow>(
            `SELECT ${BOOKING_COLUMNS} FROM bookings WHERE pnr = $1`,
            [pnr],
        );

        if (bookingResult.rows.length === 0) return null;
        const booking = BookingMapper.toDomain(bookingResult.rows[0]);

        const [scheduleResult, coachTypeResult, passengerResult] = await Promise.all([
            this.db.query<ScheduleRow>(`${SCHEDULE_SELECT} WHERE s.id = $1`, [booking.scheduleId]),
            this.db.query<CoachTypeRow>(
                `SELECT id, code, name, base_fare_cents, fare_multiplier, description
                FROM coach_types WHERE id = $1`,
                [booking.coachTypeId],
            ),
            this.db.query<PassengerRow>(
                `SELECT id, name, age, seat_preference, seat_number
                FROM passengers WHERE booking_id = $1
                ORDER BY id ASC`,
                [booking.id],
            ),
        ]);

        if (scheduleResult.rows.length === 0 || coachTypeResult.rows.length === 0) {
            throw new Error(`Booking ${booking.pnr} references a missing schedule or coach type`);
        }

        return {
            ...booking,
            schedule: ScheduleMapper.scheduleToDomain(scheduleResult.rows[0]),
            coachType: ScheduleMapper.coachTypeToDomain(coachTypeResult.rows[0]),
            passengers: passengerResult.rows.map(row => BookingMapper.passengerToDomain(row)),
        };
    }

    async recordPayment(attempt: PaymentAttempt): Promise<RecordPaymentResult> {
        return this.db.transaction(async (client): Promise<RecordPaymentResult> => {
            const locked = await client.query<BookingRow>(
                `SELECT ${BOOKING_COLUMNS} FROM bookings WHERE pnr = $1 FOR UPDATE`,
                [attempt.pnr],
            );

            if (locked.rows.length === 0) {
                return { outcome: 'booking_not_found' };
            }

            const booking = BookingMapper.toDomain(locked.rows[0]);

            if (!BookingStatusPolicy.canAcceptPayment(booking.status)) {
                return { outcome: 'already_confirmed' };
            }

            const status = BookingStatusPolicy.statusAfterPayment(attempt.approved);

            await client.query(
                'UPDATE bookings SET status = $2, updated_at = NOW() WHERE id = $1',
                [booking.id, status],
            );
            await client.query(
                `INSERT INTO payments (booking_id, amount_cents, status, method, card_last4)
                VALUES ($1, $2, $3, $4, $5)`,
                [booking.id, booking.totalFareCents, attempt.approved ? 'success' : 'failed', attempt.method, attempt.cardLast4],
            );

            return {
                outcome: 'recorded',
                bookingId: booking.id,
                status,
                amountCents: booking.totalFareCents,
            };
        });
    }

    private async explainRejectedDecrement(client: PoolClient, scheduleId: number): Promise<CreateBookingResult> {
        const current = await client.query<{ seats_available: number }>(
            'SELECT seats_available FROM schedules WHERE id = $1',
            [scheduleId],
        );

        if (current.rows.length === 0) {
            return { outcome: 'schedule_not_found' };
        }

        return { outcome: 'insufficient_seats', seatsAvailable: current.rows[0].seats_available };
    }
}
