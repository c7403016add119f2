import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { SCHEDULE_REPOSITORY } from './domain/repositories/schedule.repository.interface';
import { ScheduleRepository } from './infrastructure/persistence/schedule.repository';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: SCHEDULE_REPOSITORY,
            useClass: ScheduleRepository,
        },
    ],
    exports: [SCHEDULE_REPOSITORY],
})
export class ScheduleDddModule { }
