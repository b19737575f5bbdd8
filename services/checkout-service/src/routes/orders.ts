import type { FastifyInstance } from 'fastify';

import { getOwner, resolveOwner } from '@storefront/auth';
import type { Order, PaginatedResponse } from '@storefront/types';
import { idSchema, paginationSchema, validateParams, validateQuery } from '@storefront/validation';

import type { Container } from '../container.js';
import { NotFoundError } from '../errors.js';
import { ok } from './respond.js';

const orderParams = validateParams(idSchema);
const pageQuery = validateQuery(paginationSchema);

export function orderRoutes({ orders }: Container) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.addHook('preHandler', resolveOwner());

    // Orders of the caller, newest first
    fastify.get('/', { preHandler: pageQuery.preHandler }, async (request) => {
      const { ownerId } = getOwner(request);
      const { page, limit } = pageQuery.get(request);

      const [items, total] = await Promise.all([
        orders.listForOwner(ownerId, { limit, skip: (page - 1) * limit }),
        orders.countForOwner(ownerId),
      ]);
      const pages = Math.ceil(total / limit);

      const response: PaginatedResponse<Order> = {
        success: true,
        data: items,
        pagination: {
          page,
          limit,
          total,
          pages,
          hasNext: page < pages,
          hasPrev: page > 1,
        },
        timestamp: new Date().toISOString(),
        requestId: request.id,
      };
      return response;
    });

    fastify.get('/:id', { preHandler: orderParams.preHandler }, async (request) => {
      const { id } = orderParams.get(request);
      const order = await orders.get(id);

      // Someone else's order is indistinguishable from a missing one
      if (!order || order.ownerId !== getOwner(request).ownerId) {
        throw new NotFoundError('Order', id);
      }
      return ok(request, order);
    });
  };
}
