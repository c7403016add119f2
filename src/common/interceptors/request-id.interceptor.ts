import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import type { FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';
import { CustomLoggerService } from '../services/logger.service';
import type { RequestWithId } from '../interfaces/request-with-id.interface';

const MAX_REQUEST_ID_LENGTH = 128;

@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  private readonly logger = new CustomLoggerService();

  constructor() {
    this.logger.setContext('RequestId');
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RequestWithId>();
    const response = context.switchToHttp().getResponse<FastifyReply>();

    const xRequestIdHeader = request.headers['x-request-id'];
    const headerValue = Array.isArray(xRequestIdHeader)
      ? xRequestIdHeader[0]
      : xRequestIdHeader;

    const requestId = typeof headerValue === 'string' &&
      headerValue.length > 0 &&
      headerValue.length <= MAX_REQUEST_ID_LENGTH
      ? headerValue
      : randomUUID();

    response.header('X-Request-Id', requestId);
    request.requestId = requestId;

    if (requestId !== headerValue) {
      this.logger.debug('Generated new request ID', {
        requestId,
        method: request.method,
        url: request.url,
        ip: request.ip,
      });
    }

    return next.handle();
  }
}
