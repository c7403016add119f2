import { promises as fs } from 'fs';
import * as path from 'path';
import { PoolClient } from 'pg';

import { DatabaseClient } from './database.client';
import {
  SAMPLE_COACH_TYPES,
  SAMPLE_SCHEDULES,
  SAMPLE_STATIONS,
  SAMPLE_TRAINS,
} from './seed-data';
import { CustomLoggerService } from '../common/services/logger.service';
import { TravelDate } from '../modules/schedule/domain/value-objects/travel-date.vo';

export const SCHEMA_FILE = path.join(__dirname, '..', '..', 'sql', 'schema.sql');

/** Columns the application reads or writes, per table. */
export const EXPECTED_COLUMNS: Readonly<Record<string, readonly string[]>> = {
  stations: ['id', 'code', 'name'],
  trains: ['id', 'train_number', 'name', 'source_station_id', 'destination_station_id'],
  coach_types: ['id', 'code', 'name', 'base_fare_cents', 'fare_multiplier', 'description'],
  schedules: [
    'id',
    'train_id',
    'source_station_id',
    'destination_station_id',
    'travel_date',
    'departure_time',
    'arrival_time',
    'total_seats',
    'seats_available',
  ],
  bookings: [
    'id',
    'pnr',
    'schedule_id',
    'coach_type_id',
    'email',
    'status',
    'passenger_count',
    'total_fare_cents',
    'created_at',
    'updated_at',
  ],
  passengers: ['id', 'booking_id', 'name', 'age', 'seat_preference', 'seat_number'],
  payments: ['id', 'booking_id', 'amount_cents', 'status', 'method', 'card_last4', 'created_at'],
};

export interface SchemaConflict {
  table: string;
  missingColumns: string[];
}

export type ProvisionResult =
  | { status: 'conflict'; conflicts: SchemaConflict[] }
  | { status: 'ready'; seededTables: string[] };

interface ColumnRow {
  table_name: string;
  column_name: string;
}

/**
 * Creates the schema when it is missing and fills empty reference tables with
 * sample data. Existing tables are never dropped: a table whose columns differ
 * from the expected layout stops provisioning before anything is written.
 */
export class SchemaProvisioner {
  private readonly logger = new CustomLoggerService();

  constructor(
    private readonly db: DatabaseClient,
    private readonly schemaFile: string = SCHEMA_FILE,
  ) {
    this.logger.setContext(SchemaProvisioner.name);
  }

  async provision(today: TravelDate = TravelDate.today()): Promise<ProvisionResult> {
    const conflicts = await this.findConflicts();
    if (conflicts.length > 0) {
      this.logger.warn('Existing tables do not match the expected schema', { conflicts });
      return { status: 'conflict', conflicts };
    }

    const schemaSql = await fs.readFile(this.schemaFile, 'utf8');

    const seededTables = await this.db.transaction(async client => {
      await client.query(schemaSql);

      const seeded: string[] = [];
      if (await this.seedStations(client)) seeded.push('stations');
      if (await this.seedTrains(client)) seeded.push('trains');
      if (await this.seedCoachTypes(client)) seeded.push('coach_types');
      if (await this.seedSchedules(client, today)) seeded.push('schedules');
      return seeded;
    });

    this.logger.log('Database ready', { seededTables });
    return { status: 'ready', seededTables };
  }

  async findConflicts(): Promise<SchemaConflict[]> {
    const tables = Object.keys(EXPECTED_COLUMNS);
    const result = await this.db.query<ColumnRow>(
      `SELECT table_name, column_name
         FROM information_schema.columns
        WHERE table_schema = current_schema()
          AND table_name = ANY($1::text[])`,
      [tables],
    );

    const existing = new Map<string, Set<string>>();
    for (const row of result.rows) {
      const columns = existing.get(row.table_name) ?? new Set<string>();
      columns.add(row.column_name);
      existing.set(row.table_name, columns);
    }

    const conflicts: SchemaConflict[] = [];
    for (const table of tables) {
      const columns = existing.get(table);
      if (!columns) continue;

      const missingColumns = EXPECTED_COLUMNS[table].filter(column => !columns.has(column));
      if (missingColumns.length > 0) {
        conflicts.push({ table, missingColumns });
      }
    }

    return conflicts;
  }

  private async isEmpty(client: PoolClient, table: string): Promise<boolean> {
    const result = await client.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM ${table}`,
    );
    return (result.rows[0]?.count ?? 0) === 0;
  }

  private async seedStations(client: PoolClient): Promise<boolean> {
    if (!(await this.isEmpty(client, 'stations'))) return false;

    for (const station of SAMPLE_STATIONS) {
      await client.query('INSERT INTO stations (code, name) VALUES ($1, $2)', [
        station.code,
        station.name,
      ]);
    }
    return true;
  }

  private async seedTrains(client: PoolClient): Promise<boolean> {
    if (!(await this.isEmpty(client, 'trains'))) return false;

    for (const train of SAMPLE_TRAINS) {
      await client.query(
        `INSERT INTO trains (train_number, name, source_station_id, destination_station_id)
         SELECT $1, $2, src.id, dst.id
           FROM stations src, stations dst
          WHERE src.code = $3 AND dst.code = $4`,
        [train.number, train.name, train.sourceCode, train.destinationCode],
      );
    }
    return true;
  }

  private async seedCoachTypes(client: PoolClient): Promise<boolean> {
    if (!(await this.isEmpty(client, 'coach_types'))) return false;

    for (const coachType of SAMPLE_COACH_TYPES) {
      await client.query(
        `INSERT INTO coach_types (code, name, base_fare_cents, fare_multiplier, description)
         VALUES ($1, $2, $3, $4::numeric, $5)`,
        [
          coachType.code,
          coachType.name,
          coachType.baseFareCents,
          coachType.fareMultiplier,
          coachType.description,
        ],
      );
    }
    return true;
  }

  private async seedSchedules(client: PoolClient, today: TravelDate): Promise<boolean> {
    if (!(await this.isEmpty(client, 'schedules'))) return false;

    for (const schedule of SAMPLE_SCHEDULES) {
      await client.query(
        `INSERT INTO schedules (
           train_id, source_station_id, destination_station_id, travel_date,
           departure_time, arrival_time, total_seats, seats_available
         )
         SELECT t.id, t.source_station_id, t.destination_station_id, $2::date,
                $3::time, $4::time, $5::int, $5::int
           FROM trains t
          WHERE t.train_number = $1`,
        [
          schedule.trainNumber,
          today.addDays(schedule.daysAhead).value,
          schedule.departureTime,
          schedule.arrivalTime,
          schedule.totalSeats,
        ],
      );
    }
    return true;
  }
}
