import type { ApiResponse } from '@storefront/types';
import type { FastifyRequest } from 'fastify';

export function ok<T>(request: FastifyRequest, data: T, message?: string): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(message && { message }),
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };
}
