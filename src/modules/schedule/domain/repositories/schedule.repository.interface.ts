import type {
    CoachType,
    ScheduleDetails,
    ScheduleSearchCriteria,
    Station,
} from '../../../../schedules/entities/schedule.entity';

export const SCHEDULE_REPOSITORY = Symbol('SCHEDULE_REPOSITORY');

export interface IScheduleRepository {
    listStations(): Promise<Station[]>;
    findStation(id: number): Promise<Station | null>;
    listCoachTypes(): Promise<CoachType[]>;
    findCoachType(id: number): Promise<CoachType | null>;
    /** Schedules on the route and date, ordered by departure time. */
    search(criteria: ScheduleSearchCriteria): Promise<ScheduleDetails[]>;
    findById(id: number): Promise<ScheduleDetails | null>;
}
