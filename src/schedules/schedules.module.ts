import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { ScheduleDddModule } from '../modules/schedule/schedule-ddd.module';
import { ViewsModule } from '../views/views.module';
import { SchedulesController } from './schedules.controller';
import { SchedulesService } from './schedules.service';

@Module({
  imports: [CommonModule, ScheduleDddModule, ViewsModule],
  controllers: [SchedulesController],
  providers: [SchedulesService],
  exports: [SchedulesService],
})
export class SchedulesModule { }
