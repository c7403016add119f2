import { Module } from '@nestjs/common';
import { ThrottlerModule } from '@nestjs/throttler';
import { CustomLoggerService, MetricsService } from './services';
import { MetricsController } from './controllers/metrics.controller';
import { LoggingInterceptor } from './interceptors/logging.interceptor';
import { ThrottleConfig } from './decorators/throttle.decorator';
import { DatabaseModule } from '../database/database.module';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        name: 'default',
        ...ThrottleConfig.DEFAULT.default,
      },
    ]),
    DatabaseModule,
  ],
  controllers: [MetricsController],
  providers: [
    {
      provide: CustomLoggerService,
      useClass: CustomLoggerService,
    },
    MetricsService,
    LoggingInterceptor,
  ],
  exports: [
    CustomLoggerService,
    MetricsService,
    LoggingInterceptor,
    ThrottlerModule,
    DatabaseModule,
  ],
})
export class CommonModule {}
