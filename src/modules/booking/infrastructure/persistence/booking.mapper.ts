import {
    Booking,
    BOOKING_STATUSES,
    BookingStatus,
    Passenger,
    SEAT_PREFERENCES,
    SeatPreference,
} from '../../../../bookings/entities/booking.entity';

export interface BookingRow {
    id: number;
    pnr: string;
    schedule_id: number;
    coach_type_id: number;
    email: string | null;
    status: string;
    passenger_count: number;
    total_fare_cents: number;
    created_at: Date;
    updated_at: Date;
}

export interface PassengerRow {
    id: number;
    name: string;
    age: number;
    seat_preference: string;
    seat_number: string;
}

function isBookingStatus(value: string): value is BookingStatus {
    return BOOKING_STATUSES.some(status => status === value);
}

function isSeatPreference(value: string): value is SeatPreference {
    return SEAT_PREFERENCES.some(preference => preference === value);
}

export class BookingMapper {
    static toDomain(row: BookingRow): Booking {
        if (!isBookingStatus(row.status)) {
            throw new Error(`Booking ${row.pnr} has unknown status ${row.status}`);
        }

        return {
            id: row.id,
            pnr: row.pnr,
            scheduleId: row.schedule_id,
            coachTypeId: row.coach_type_id,
            email: row.email,
            status: row.status,
            passengerCount: row.passenger_count,
            totalFareCents: row.total_fare_cents,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
        };
    }

    static passengerToDomain(row: PassengerRow): Passenger {
        return {
            id: row.id,
            name: row.name,
            age: row.age,
            seatPreference: isSeatPreference(row.seat_preference) ? row.seat_preference : 'no_preference',
            seatNumber: row.seat_number,
        };
    }
}
