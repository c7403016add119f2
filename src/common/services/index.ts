export * from './logger.service';
export * from './metrics.service';
