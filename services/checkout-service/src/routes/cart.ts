import type { FastifyInstance } from 'fastify';

import { getOwner, requireUser, resolveOwner, sessionOwnerId } from '@storefront/auth';
import {
  addCartItemSchema,
  cartVersionSchema,
  mergeCartSchema,
  productIdParamsSchema,
  updateCartItemSchema,
  validateBody,
  validateParams,
  validateQuery,
} from '@storefront/validation';

import type { Container } from '../container.js';
import { ok } from './respond.js';

const addItemBody = validateBody(addCartItemSchema);
const updateItemBody = validateBody(updateCartItemSchema);
const itemParams = validateParams(productIdParamsSchema);
const versionQuery = validateQuery(cartVersionSchema);
const versionBody = validateBody(cartVersionSchema);
const mergeBody = validateBody(mergeCartSchema);

export function cartRoutes({ carts }: Container) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.addHook('preHandler', resolveOwner());

    fastify.get('/', async (request) => {
      return ok(request, await carts.getCart(getOwner(request).ownerId));
    });

    fastify.post('/items', { preHandler: addItemBody.preHandler }, async (request) => {
      const { productId, quantity, version, replace } = addItemBody.get(request);
      const cart = await carts.addItem(getOwner(request).ownerId, productId, quantity, {
        expectedVersion: version,
        replace,
      });
      return ok(request, cart, 'Item added to cart');
    });

    fastify.patch(
      '/items/:productId',
      { preHandler: [itemParams.preHandler, updateItemBody.preHandler] },
      async (request) => {
        const { productId } = itemParams.get(request);
        const { quantity, version } = updateItemBody.get(request);
        const cart = await carts.updateQuantity(getOwner(request).ownerId, productId, quantity, {
          expectedVersion: version,
        });
        return ok(request, cart, 'Cart item updated');
      }
    );

    fastify.delete(
      '/items/:productId',
      { preHandler: [itemParams.preHandler, versionQuery.preHandler] },
      async (request) => {
        const { productId } = itemParams.get(request);
        const { version } = versionQuery.get(request);
        const cart = await carts.removeItem(getOwner(request).ownerId, productId, {
          expectedVersion: version,
        });
        return ok(request, cart, 'Item removed from cart');
      }
    );

    fastify.post('/clear', { preHandler: versionBody.preHandler }, async (request) => {
      const { version } = versionBody.get(request);
      return ok(request, await carts.clear(getOwner(request).ownerId, version), 'Cart cleared');
    });

    fastify.post('/merge', { preHandler: [requireUser(), mergeBody.preHandler] }, async (request) => {
      const { sessionId } = mergeBody.get(request);
      const cart = await carts.merge(getOwner(request).ownerId, sessionOwnerId(sessionId));
      return ok(request, cart, 'Session cart merged');
    });
  };
}
