import type { FastifyRequest } from 'fastify';

export interface RequestWithId extends FastifyRequest {
  requestId?: string;
}
