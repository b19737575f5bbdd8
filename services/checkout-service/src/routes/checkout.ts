import type { FastifyInstance } from 'fastify';

import { getOwner, resolveOwner } from '@storefront/auth';
import { checkoutSchema, validateBody } from '@storefront/validation';

import type { Container } from '../container.js';
import { ok } from './respond.js';

const checkoutBody = validateBody(checkoutSchema);

export function checkoutRoutes({ checkout }: Container) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.post(
      '/',
      { preHandler: [resolveOwner(), checkoutBody.preHandler] },
      async (request, reply) => {
        const owner = getOwner(request);
        const { idempotencyKey, paymentDetails } = checkoutBody.get(request);

        const result = await checkout.checkout(owner.ownerId, { idempotencyKey, paymentDetails });

        reply.code(result.replayed ? 200 : 201);
        return ok(request, result, result.replayed ? 'Order already placed' : 'Order placed');
      }
    );
  };
}
