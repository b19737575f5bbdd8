import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import type {
  AddCartItemRequest,
  CheckoutRequest,
  PaginationQuery,
  UpdateCartItemRequest,
} from '@storefront/types';

// Common schemas
export const idSchema = z.object({
  id: z.string().uuid('Invalid ID format'),
});

export const productIdSchema = z
  .string()
  .min(1, 'Product ID is required')
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/, 'Invalid product ID');

export const productIdParamsSchema = z.object({
  productId: productIdSchema,
});

// Orders always list newest first, so no sort parameter is taken
export const paginationSchema: z.ZodType<PaginationQuery, z.ZodTypeDef, unknown> = z
  .object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),
  })
  .strict();

const versionSchema = z.coerce.number().int().min(0);

// Cart schemas
export const addCartItemSchema: z.ZodType<AddCartItemRequest, z.ZodTypeDef, unknown> = z.object({
  productId: productIdSchema,
  quantity: z.number().int().min(1, 'Quantity must be at least 1'),
  version: versionSchema.optional(),
  replace: z.boolean().optional(),
});

export const updateCartItemSchema: z.ZodType<UpdateCartItemRequest, z.ZodTypeDef, unknown> = z.object({
  quantity: z.number().int().min(0, 'Quantity must be non-negative'),
  version: versionSchema.optional(),
});

export const cartVersionSchema: z.ZodType<{ version?: number }, z.ZodTypeDef, unknown> = z
  .object({
    version: versionSchema.optional(),
  })
  .default({});

export const mergeCartSchema = z.object({
  sessionId: z
    .string()
    .min(8, 'Session ID is too short')
    .max(128)
    .regex(/^[A-Za-z0-9_-]+$/, 'Invalid session ID'),
});

// Inventory schemas
export const setStockSchema = z.object({
  available: z.number().int().min(0, 'Available stock cannot be negative'),
});

// Checkout schemas
export const paymentDetailsSchema = z.object({
  token: z.string().min(1, 'Payment token is required').max(200),
  cardholderName: z.string().min(1).max(200).optional(),
});

export const checkoutSchema: z.ZodType<CheckoutRequest, z.ZodTypeDef, unknown> = z.object({
  idempotencyKey: z
    .string()
    .min(8, 'Idempotency key must be at least 8 characters')
    .max(128)
    .optional(),
  paymentDetails: paymentDetailsSchema,
});

type RequestSource = 'body' | 'query' | 'params';

const sourceErrors: Record<RequestSource, string> = {
  body: 'Validation failed',
  query: 'Query validation failed',
  params: 'Parameter validation failed',
};

export interface RequestValidator<T> {
  preHandler: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  get: (request: FastifyRequest) => T;
}

function createValidator<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: RequestSource
): RequestValidator<T> {
  const parsed = new WeakMap<FastifyRequest, { value: T }>();

  return {
    async preHandler(request: FastifyRequest, reply: FastifyReply): Promise<void> {
      const result = schema.safeParse(request[source]);
      if (!result.success) {
        reply.code(400).send({
          success: false,
          error: sourceErrors[source],
          code: 'VALIDATION_FAILED',
          details: result.error.issues.map((issue) => ({
            field: issue.path.join('.'),
            message: issue.message,
          })),
          timestamp: new Date().toISOString(),
        });
        return;
      }
      parsed.set(request, { value: result.data });
    },

    get(request: FastifyRequest): T {
      const entry = parsed.get(request);
      if (!entry) {
        throw new Error(`Request ${source} was read before validation`);
      }
      return entry.value;
    },
  };
}

// Validation middleware
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestValidator<T> {
  return createValidator(schema, 'body');
}

export function validateQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestValidator<T> {
  return createValidator(schema, 'query');
}

export function validateParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestValidator<T> {
  return createValidator(schema, 'params');
}
