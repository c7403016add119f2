import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ThrottlerException } from '@nestjs/throttler';
import { CustomLoggerService } from '../services/logger.service';
import type { RequestWithId } from '../interfaces/request-with-id.interface';
import { toError } from '../utils/to-error';
import { ViewsService } from '../../views/views.service';

export interface ErrorResponse {
  code: string;
  message: string;
  details: string[];
  requestId: string;
  timestamp: string;
  path: string;
}

interface NormalizedError {
  status: number;
  code: string;
  message: string;
  details: string[];
}

const TITLES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'Please check your details',
  [HttpStatus.NOT_FOUND]: 'Not found',
  [HttpStatus.CONFLICT]: 'Request cannot be completed',
  [HttpStatus.TOO_MANY_REQUESTS]: 'Too many requests',
  [HttpStatus.SERVICE_UNAVAILABLE]: 'Service unavailable',
};

/**
 * Renders every error as the HTML error page, or as JSON when the client
 * asks only for JSON.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new CustomLoggerService();

  constructor(private readonly views: ViewsService) {
    this.logger.setContext('HttpExceptionFilter');
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<RequestWithId>();

    const requestId = request.requestId ?? 'unknown';
    const path = request.url;
    const { status, code, message, details } = this.normalize(exception);

    if (status >= 500) {
      this.logger.logError(toError(exception), {
        requestId,
        path,
        method: request.method,
        ip: request.ip,
        userAgent: request.headers['user-agent'],
      });
    } else if (status === HttpStatus.TOO_MANY_REQUESTS) {
      this.logger.logSecurityEvent('RATE_LIMIT_RESPONSE', {
        requestId,
        path,
        method: request.method,
        ip: request.ip,
      });
    } else {
      this.logger.warn(`HTTP ${status} ${code}: ${message}`, {
        requestId,
        path,
        method: request.method,
      });
    }

    if (response.sent) {
      return;
    }

    if (this.wantsJson(request)) {
      const body: ErrorResponse = {
        code,
        message,
        details,
        requestId,
        timestamp: new Date().toISOString(),
        path,
      };
      // routes declare text/html up front; an object payload needs a JSON type to serialize
      response.status(status).type('application/json; charset=utf-8').send(body);
      return;
    }

    const html = this.views.render('error', {
      title: TITLES[status] ?? (status >= 500 ? 'Something went wrong' : 'Error'),
      statusCode: status,
      message,
      details,
      requestId,
    });

    response.status(status).type('text/html; charset=utf-8').send(html);
  }

  private normalize(exception: unknown): NormalizedError {
    if (exception instanceof ThrottlerException) {
      return {
        status: HttpStatus.TOO_MANY_REQUESTS,
        code: 'RATE_LIMITED',
        message: 'Too many requests. Please wait a minute and try again.',
        details: [],
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();

      if (status >= 500) {
        return { status, code: this.getErrorCode(status), message: exception.message, details: [] };
      }

      return {
        status,
        code: this.getErrorCode(status),
        message: this.extractMessage(body) ?? exception.message,
        details: this.extractDetails(body),
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_ERROR',
      message: 'Something went wrong on our side. Please try again later.',
      details: [],
    };
  }

  private extractMessage(body: string | object): string | undefined {
    if (typeof body === 'string') {
      return body;
    }
    if ('message' in body) {
      const { message } = body;
      if (typeof message === 'string') return message;
      if (Array.isArray(message)) return 'Validation failed';
    }
    return undefined;
  }

  /** Flattens `{ field: [messages] }` and message arrays into a list. */
  private extractDetails(body: string | object): string[] {
    if (typeof body === 'string') {
      return [];
    }

    const source = 'details' in body
      ? body.details
      : 'message' in body ? body.message : undefined;

    if (Array.isArray(source)) {
      return source.filter((item): item is string => typeof item === 'string');
    }

    if (typeof source === 'object' && source !== null) {
      return Object.values(source)
        .flatMap((messages: unknown) => (Array.isArray(messages) ? messages : [messages]))
        .filter((item): item is string => typeof item === 'string');
    }

    return [];
  }

  private wantsJson(request: RequestWithId): boolean {
    const accept = request.headers.accept ?? '';
    return accept.includes('application/json') && !accept.includes('text/html');
  }

  private getErrorCode(status: number): string {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return 'VALIDATION_ERROR';
      case HttpStatus.NOT_FOUND:
        return 'NOT_FOUND';
      case HttpStatus.CONFLICT:
        return 'CONFLICT';
      case HttpStatus.PAYMENT_REQUIRED:
        return 'PAYMENT_DECLINED';
      case HttpStatus.TOO_MANY_REQUESTS:
        return 'RATE_LIMITED';
      case HttpStatus.SERVICE_UNAVAILABLE:
        return 'SERVICE_UNAVAILABLE';
      case HttpStatus.INTERNAL_SERVER_ERROR:
        return 'INTERNAL_ERROR';
      default:
        return 'UNKNOWN_ERROR';
    }
  }
}
