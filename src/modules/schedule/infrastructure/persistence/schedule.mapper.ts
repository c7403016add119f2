import { FareCalculation } from '../../../booking/domain/value-objects/fare-calculation.vo';
import type {
    CoachType,
    ScheduleDetails,
    Station,
} from '../../../../schedules/entities/schedule.entity';

export interface StationRow {
    id: number;
    code: string;
    name: string;
}

export interface CoachTypeRow {
    id: number;
    code: string;
    name: string;
    base_fare_cents: number;
    // NUMERIC comes back from pg as a string
    fare_multiplier: string;
    description: string | null;
}

export interface ScheduleRow {
    id: number;
    train_id: number;
    train_number: string;
    train_name: string;
    source_id: number;
    source_code: string;
    source_name: string;
    destination_id: number;
    destination_code: string;
    destination_name: string;
    travel_date: string;
    departure_time: string;
    arrival_time: string;
    total_seats: number;
    seats_available: number;
}

export class ScheduleMapper {
    static stationToDomain(row: StationRow): Station {
        return { id: row.id, code: row.code, name: row.name };
    }

    static coachTypeToDomain(row: CoachTypeRow): CoachType {
        const fareMultiplier = Number(row.fare_multiplier);

        return {
            id: row.id,
            code: row.code,
            name: row.name,
            baseFareCents: row.base_fare_cents,
            fareMultiplier,
            description: row.description,
            fareCents: FareCalculation.farePerPassenger(row.base_fare_cents, fareMultiplier),
        };
    }

    static scheduleToDomain(row: ScheduleRow): ScheduleDetails {
        return {
            id: row.id,
            train: { id: row.train_id, number: row.train_number, name: row.train_name },
            source: { id: row.source_id, code: row.source_code, name: row.source_name },
            destination: {
                id: row.destination_id,
                code: row.destination_code,
                name: row.destination_name,
            },
            travelDate: row.travel_date,
            departureTime: row.departure_time,
            arrivalTime: row.arrival_time,
            totalSeats: row.total_seats,
            seatsAvailable: row.seats_available,
        };
    }
}
