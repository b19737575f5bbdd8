import type { FastifyInstance } from 'fastify';

import type { Container } from '../container.js';
import { cartRoutes } from './cart.js';
import { checkoutRoutes } from './checkout.js';
import { inventoryRoutes } from './inventory.js';
import { orderRoutes } from './orders.js';

export async function setupRoutes(app: FastifyInstance, container: Container): Promise<void> {
  await app.register(cartRoutes(container), { prefix: '/api/cart' });
  await app.register(checkoutRoutes(container), { prefix: '/api/checkout' });
  await app.register(orderRoutes(container), { prefix: '/api/orders' });
  await app.register(inventoryRoutes(container), { prefix: '/api/inventory' });
}
