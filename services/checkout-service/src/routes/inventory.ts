import type { FastifyInstance } from 'fastify';

import { requireRoles, resolveOwner } from '@storefront/auth';
import { productIdParamsSchema, setStockSchema, validateBody, validateParams } from '@storefront/validation';

import type { Container } from '../container.js';
import { ok } from './respond.js';

const stockParams = validateParams(productIdParamsSchema);
const stockBody = validateBody(setStockSchema);

/** Stock administration. */
export function inventoryRoutes({ inventory }: Container) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.addHook('preHandler', resolveOwner());
    fastify.addHook('preHandler', requireRoles('admin'));

    fastify.get('/:productId', { preHandler: stockParams.preHandler }, async (request) => {
      const { productId } = stockParams.get(request);
      return ok(request, await inventory.getStock(productId));
    });

    fastify.put(
      '/:productId',
      { preHandler: [stockParams.preHandler, stockBody.preHandler] },
      async (request) => {
        const { productId } = stockParams.get(request);
        const { available } = stockBody.get(request);
        return ok(request, await inventory.setStock(productId, available), 'Stock updated');
      }
    );
  };
}
