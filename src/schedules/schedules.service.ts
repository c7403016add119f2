import { BadRequestException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolveBookingConfig } from '../common/config/booking.config';
import { CustomLoggerService } from '../common/services/logger.service';
import {
  IScheduleRepository,
  SCHEDULE_REPOSITORY,
} from '../modules/schedule/domain/repositories/schedule.repository.interface';
import { SeatInventory } from '../modules/schedule/domain/value-objects/seat-inventory.vo';
import { TravelDate } from '../modules/schedule/domain/value-objects/travel-date.vo';
import type { SearchSchedulesDto } from './dto/search-schedules.dto';
import type {
  CoachType,
  ScheduleAvailability,
  ScheduleDetails,
  ScheduleSearchResult,
  Station,
} from './entities/schedule.entity';

@Injectable()
export class SchedulesService {
  constructor(
    @Inject(SCHEDULE_REPOSITORY) private readonly schedules: IScheduleRepository,
    private readonly configService: ConfigService,
    private readonly logger: CustomLoggerService,
  ) { }

  async listStations(): Promise<Station[]> {
    return this.schedules.listStations();
  }

  async listCoachTypes(): Promise<CoachType[]> {
    return this.schedules.listCoachTypes();
  }

  async getSchedule(scheduleId: number): Promise<ScheduleDetails> {
    const schedule = await this.schedules.findById(scheduleId);

    if (!schedule) {
      throw new NotFoundException('Schedule not found');
    }

    return schedule;
  }

  async search(dto: SearchSchedulesDto): Promise<ScheduleSearchResult> {
    if (dto.source === dto.destination) {
      throw new BadRequestException('Source and destination must be different stations');
    }

    let travelDate: TravelDate;
    try {
      travelDate = TravelDate.parse(dto.date);
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : 'Invalid travel date');
    }

    const [source, destination] = await Promise.all([
      this.schedules.findStation(dto.source),
      this.schedules.findStation(dto.destination),
    ]);

    if (!source || !destination) {
      throw new NotFoundException('Station not found');
    }

    const criteria = {
      sourceStationId: source.id,
      destinationStationId: destination.id,
      travelDate: travelDate.value,
    };

    const [matches, coachTypes] = await Promise.all([
      this.schedules.search(criteria),
      this.schedules.listCoachTypes(),
    ]);

    const { limitedSeatsPercent } = resolveBookingConfig(this.configService);
    const schedules: ScheduleAvailability[] = matches.map(schedule => ({
      ...schedule,
      availability: SeatInventory.create(schedule.totalSeats, schedule.seatsAvailable)
        .availabilityLevel(limitedSeatsPercent),
    }));

    this.logger.debug('Schedule search completed', {
      ...criteria,
      results: schedules.length,
    });

    return {
      criteria,
      source,
      destination,
      schedules,
      coachTypes,
      lowestFareCents: coachTypes.length > 0
        ? Math.min(...coachTypes.map(coachType => coachType.fareCents))
        : null,
    };
  }

  /** Choices offered by the passenger-count selectors. */
  passengerCountOptions(): number[] {
    const { maxPassengersPerBooking } = resolveBookingConfig(this.configService);
    return Array.from({ length: maxPassengersPerBooking }, (_, index) => index + 1);
  }
}
