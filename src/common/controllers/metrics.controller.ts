import { Controller, Get, Header, HttpCode, HttpStatus, Inject, ServiceUnavailableException } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { MetricsService } from '../services/metrics.service';
import { CustomLoggerService } from '../services/logger.service';
import { DatabaseClient } from '../../database/database.client';
import { DATABASE_CLIENT } from '../../database/database.module';
import { toError } from '../utils/to-error';

export interface HealthReport {
  status: 'healthy';
  timestamp: string;
  service: string;
  uptime: number;
  checks: {
    database: { status: 'pass'; latencyMs: number };
  };
}

@Controller()
@SkipThrottle()
export class MetricsController {
  private readonly logger = new CustomLoggerService();

  constructor(
    private readonly metricsService: MetricsService,
    @Inject(DATABASE_CLIENT) private readonly db: DatabaseClient,
  ) {
    this.logger.setContext('MetricsController');
  }

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  @HttpCode(HttpStatus.OK)
  async getMetrics(): Promise<string> {
    const metrics = await this.metricsService.getMetrics();

    this.logger.debug('Metrics endpoint accessed', {
      metricsSize: metrics.length,
    });

    return metrics;
  }

  @Get('health')
  @HttpCode(HttpStatus.OK)
  async getHealth(): Promise<HealthReport> {
    const startedAt = Date.now();

    try {
      await this.db.query('SELECT 1');
    } catch (error) {
      this.logger.logError(toError(error), { endpoint: '/health' });
      throw new ServiceUnavailableException('Database is not reachable');
    }

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'rail-reservations',
      uptime: process.uptime(),
      checks: {
        database: { status: 'pass', latencyMs: Date.now() - startedAt },
      },
    };
  }
}
