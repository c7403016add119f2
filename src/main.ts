import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { DatabaseClient } from './database/database.client';
import { DatabaseConfig } from './database/database.config';
import { CustomLoggerService } from './common/services/logger.service';
import { toError } from './common/utils/to-error';

async function bootstrap() {
  const logger = new CustomLoggerService();
  logger.setContext('Bootstrap');

  try {
    const dbConfig = DatabaseConfig.fromEnv();
    const dbClient = await DatabaseClient.initialize(dbConfig);

    const nestLogger = new CustomLoggerService();
    nestLogger.setContext('NestApplication');
    const app = await NestFactory.create<NestFastifyApplication>(
      AppModule,
      new FastifyAdapter({ trustProxy: process.env.TRUST_PROXY === 'true' }),
      { logger: nestLogger },
    );

    await configureApp(app);

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      try {
        await app.close();
        await dbClient.disconnect();
        logger.log('Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.logError(toError(error), { signal });
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));

    const port = process.env.PORT ?? 3000;
    await app.listen(port, '0.0.0.0');

    logger.log('Application started successfully', {
      port,
      environment: process.env.NODE_ENV,
      nodeVersion: process.version,
    });

    const baseUrl = `http://localhost:${port}`;
    logger.log('Important endpoints', {
      search: `${baseUrl}/`,
      health: `${baseUrl}/health`,
      metrics: `${baseUrl}/metrics`,
    });
  } catch (error) {
    logger.logError(toError(error), {
      context: 'bootstrap',
    });
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  const logger = new CustomLoggerService();
  logger.setContext('UnhandledRejection');
  const reasonStr = reason instanceof Error ? reason.message : String(reason);
  logger.logError(new Error(`Unhandled Rejection: ${reasonStr}`), {
    reason: reasonStr,
  });
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  const logger = new CustomLoggerService();
  logger.setContext('UncaughtException');
  logger.logError(error, {
    context: 'uncaughtException',
  });
  process.exit(1);
});

void bootstrap();
