import { Inject, Injectable } from '@nestjs/common';
import { DatabaseClient } from '../../../../database/database.client';
import { DATABASE_CLIENT } from '../../../../database/database.module';
import type {
    CoachType,
    ScheduleDetails,
    ScheduleSearchCriteria,
    Station,
} from '../../../../schedules/entities/schedule.entity';
import { IScheduleRepository } from '../../domain/repositories/schedule.repository.interface';
import { CoachTypeRow, ScheduleMapper, ScheduleRow, StationRow } from './schedule.mapper';

/**
 * Shared projection for schedule reads. Dates and times are formatted by
 * Postgres so the process never converts them through a JS Date.
 */
export const SCHEDULE_SELECT = `
    SELECT
        s.id,
        t.id AS train_id,
        t.train_number,
        t.name AS train_name,
        src.id AS source_id,
        src.code AS source_code,
        src.name AS source_name,
        dst.id AS destination_id,
        dst.code AS destination_code,
        dst.name AS destination_name,
        to_char(s.travel_date, 'YYYY-MM-DD') AS travel_date,
        to_char(s.departure_time, 'HH24:MI') AS departure_time,
        to_char(s.arrival_time, 'HH24:MI') AS arrival_time,
        s.total_seats,
        s.seats_available
    FROM schedules s
    JOIN trains t ON t.id = s.train_id
    JOIN stations src ON src.id = s.source_station_id
    JOIN stations dst ON dst.id = s.destination_station_id`;

@Injectable()
export class ScheduleRepository implements IScheduleRepository {
    constructor(@Inject(DATABASE_CLIENT) private readonly db: DatabaseClient) { }

    async listStations(): Promise<Station[]> {
        const result = await this.db.query<StationRow>(
            'SELECT id, code, name FROM stations ORDER BY name ASC',
        );
        return result.rows.map(row => ScheduleMapper.stationToDomain(row));
    }

    async findStation(id: number): Promise<Station | null> {
        const result = await this.db.query<StationRow>(
            'SELECT id, code, name FROM stations WHERE id = $1',
            [id],
        );

        if (result.rows.length === 0) return null;
        return ScheduleMapper.stationToDomain(result.rows[0]);
    }

    async listCoachTypes(): Promise<CoachType[]> {
        const result = await this.db.query<CoachTypeRow>(
            `SELECT id, code, name, base_fare_cents, fare_multiplier, description
            FROM coach_types
            ORDER BY base_fare_cents ASC, id ASC`,
        );
        return result.rows.map(row => ScheduleMapper.coachTypeToDomain(row));
    }

    async findCoachType(id: number): Promise<CoachType | null> {
        const result = await this.db.query<CoachTypeRow>(
            `SELECT id, code, name, base_fare_cents, fare_multiplier, description
            FROM coach_types
            WHERE id = $1`,
            [id],
        );

        if (result.rows.length === 0) return null;
        return ScheduleMapper.coachTypeToDomain(result.rows[0]);
    }

    async search(criteria: ScheduleSearchCriteria): Promise<ScheduleDetails[]> {
        const result = await this.db.query<ScheduleRow>(
            `${SCHEDULE_SELECT}
            WHERE s.source_station_id = $1
                AND s.destination_station_id = $2
                AND s.travel_date = $3::date
            ORDER BY s.departure_time ASC, s.id ASC`,
            [criteria.sourceStationId, criteria.destinationStationId, criteria.travelDate],
        );

        return result.rows.map(row => ScheduleMapper.scheduleToDomain(row));
    }

    async findById(id: number): Promise<ScheduleDetails | null> {
        const result = await this.db.query<ScheduleRow>(
            `${SCHEDULE_SELECT}
            WHERE s.id = $1`,
            [id],
        );

        if (result.rows.length === 0) return null;
        return ScheduleMapper.scheduleToDomain(result.rows[0]);
    }
}
