import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError, finalize } from 'rxjs/operators';
import type { FastifyReply } from 'fastify';
import { CustomLoggerService } from '../services/logger.service';
import { MetricsService } from '../services/metrics.service';
import type { RequestWithId } from '../interfaces/request-with-id.interface';
import { toError } from '../utils/to-error';

// Passenger details and card numbers are posted here
const SENSITIVE_ENDPOINTS = ['/book', '/pay'];
const SLOW_REQUEST_MS = 1000;

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new CustomLoggerService();

  constructor(private readonly metrics: MetricsService) {
    this.logger.setContext('HTTP');
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RequestWithId>();
    const response = context.switchToHttp().getResponse<FastifyReply>();
    const startTime = Date.now();

    const { method, url, ip, requestId } = request;
    const route = request.routeOptions.url ?? url;
    const userAgent = request.headers['user-agent'] ?? 'unknown';
    const body = request.body;

    this.metrics.incrementHttpRequestsInFlight();
    this.logger.logRequest({
      requestId,
      method,
      url,
      ip,
      userAgent,
      contentLength: Number(request.headers['content-length'] ?? 0),
      body: this.shouldLogBody(method, url, body) ? body : undefined,
    });

    return next.handle().pipe(
      tap(() => {
        const responseTime = Date.now() - startTime;
        const statusCode = response.statusCode;

        this.logger.logResponse({
          requestId,
          method,
          url,
          statusCode,
          responseTime,
          ip,
          userAgent,
        });
        this.recordMetrics(method, route, statusCode, responseTime);

        if (responseTime > SLOW_REQUEST_MS) {
          this.logger.logPerformance(`${method} ${url}`, responseTime, {
            requestId,
            statusCode,
          });
        }
      }),
      catchError((error: unknown) => {
        const responseTime = Date.now() - startTime;
        const statusCode = error instanceof HttpException
          ? error.getStatus()
          : HttpStatus.INTERNAL_SERVER_ERROR;

        this.logger.logResponse({
          requestId,
          method,
          url,
          statusCode,
          responseTime,
          ip,
          userAgent,
          error: toError(error).message,
        });
        this.recordMetrics(method, route, statusCode, responseTime);

        throw error;
      }),
      finalize(() => this.metrics.decrementHttpRequestsInFlight()),
    );
  }

  private recordMetrics(method: string, route: string, statusCode: number, responseTime: number): void {
    this.metrics.incrementHttpRequests(method, route, statusCode);
    this.metrics.recordHttpRequestDuration(method, route, statusCode, responseTime);
  }

  private shouldLogBody(method: string, url: string, body: unknown): boolean {
    if (method === 'GET' || body === undefined || body === null) {
      return false;
    }

    if (SENSITIVE_ENDPOINTS.some(endpoint => url.startsWith(endpoint))) {
      return false;
    }

    return JSON.stringify(body).length <= 1024;
  }
}
