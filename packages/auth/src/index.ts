import type { FastifyReply, FastifyRequest } from 'fastify';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import { getConfig } from '@storefront/config';
import { logger } from '@storefront/logger';
import type { JWTPayload, Owner, Role } from '@storefront/types';

const config = getConfig();

const SESSION_HEADER = 'x-session-id';
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

const jwtPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
  roles: z.array(z.enum(['user', 'admin', 'service'])),
  iat: z.number(),
  exp: z.number(),
});

// JWT token management
export function signAccessToken(payload: Omit<JWTPayload, 'iat' | 'exp'>): string {
  return jwt.sign(payload, config.JWT_ACCESS_SECRET, {
    expiresIn: config.JWT_ACCESS_TTL_SECONDS,
    issuer: config.JWT_ISSUER,
  });
}

export function verifyAccessToken(token: string): JWTPayload {
  try {
    const decoded = jwt.verify(token, config.JWT_ACCESS_SECRET, { issuer: config.JWT_ISSUER });
    return jwtPayloadSchema.parse(decoded);
  } catch {
    throw new Error('Invalid access token');
  }
}

export function extractTokenFromHeader(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : authHeader;
  return token.length > 0 ? token : null;
}

export function userOwnerId(userId: string): string {
  return `user:${userId}`;
}

export function sessionOwnerId(sessionId: string): string {
  return `session:${sessionId}`;
}

// Fastify request context
declare module 'fastify' {
  interface FastifyRequest {
    user?: JWTPayload;
    owner?: Owner;
  }
}

function unauthorized(reply: FastifyReply, error: string): void {
  reply.code(401).send({
    success: false,
    error,
    code: 'UNAUTHORIZED',
    timestamp: new Date().toISOString(),
  });
}

/**
 * Resolves the cart/order owner. A bearer token identifies a signed-in user;
 * without one the stable anonymous session id from `X-Session-Id` is used.
 * Identity is trusted as verified here; nothing downstream re-checks it.
 */
export function resolveOwner() {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const token = extractTokenFromHeader(request.headers.authorization);

    if (token) {
      try {
        const user = verifyAccessToken(token);
        request.user = user;
        request.owner = {
          ownerId: userOwnerId(user.userId),
          kind: 'user',
          userId: user.userId,
          roles: user.roles,
        };
        logger.debug({ userId: user.userId }, 'User authenticated');
      } catch (error) {
        logger.warn({ error: error instanceof Error ? error.message : error }, 'Authentication failed');
        unauthorized(reply, 'Invalid or expired token');
      }
      return;
    }

    const sessionHeader = request.headers[SESSION_HEADER];
    const sessionId = Array.isArray(sessionHeader) ? sessionHeader[0] : sessionHeader;

    if (!sessionId) {
      unauthorized(reply, 'Authorization header or session id required');
      return;
    }

    if (!SESSION_ID_PATTERN.test(sessionId)) {
      unauthorized(reply, 'Invalid session id');
      return;
    }

    request.owner = {
      ownerId: sessionOwnerId(sessionId),
      kind: 'session',
      roles: [],
    };
  };
}

export function requireUser() {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
    if (request.owner?.kind !== 'user') {
      unauthorized(reply, 'Authentication required');
    }
  };
}

export function requireRoles(...allowedRoles: Role[]) {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const owner = request.owner;
    if (!owner) {
      unauthorized(reply, 'Authentication required');
      return;
    }

    if (!owner.roles.some((role) => allowedRoles.includes(role))) {
      logger.warn(
        { ownerId: owner.ownerId, roles: owner.roles, requiredRoles: allowedRoles },
        'Access denied - insufficient roles'
      );

      reply.code(403).send({
        success: false,
        error: 'Insufficient permissions',
        code: 'FORBIDDEN',
        timestamp: new Date().toISOString(),
      });
    }
  };
}

export function getOwner(request: FastifyRequest): Owner {
  if (!request.owner) {
    throw new Error('Owner not resolved for request; register resolveOwner() first');
  }
  return request.owner;
}
