import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthPrincipal, CredentialService, PublicUser } from '../types/auth';
import { AuthError } from '../utils/errors';

// Extend Fastify request with the authenticated principal
declare module 'fastify' {
    interface FastifyRequest {
        principal?: AuthPrincipal;
        currentUser?: PublicUser;
    }
}

/**
 * Extracts the token from `Authorization: Bearer <token>` (scheme is case-insensitive).
 */
export function extractBearerToken(header: string | undefined): string | null {
    if (!header) return null;
    const match = header.match(/^Bearer\s+(\S+)\s*$/i);
    return match ? match[1] : null;
}

/**
 * Builds the Fastify preHandler that validates the bearer access token and
 * attaches `request.principal` / `request.currentUser`. Failures are thrown
 * and rendered by the app error handler.
 */
export function createAuthenticate(service: CredentialService) {
    return async function authenticate(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
        const token = extractBearerToken(request.headers.authorization);
        if (!token) {
            throw AuthError.unauthenticated();
        }

        const { principal, user } = await service.validateAccessToken(token);
        request.principal = principal;
        request.currentUser = user;
    };
}

/** The principal set by `authenticate`; throws when the route forgot the hook. */
export function requirePrincipal(request: FastifyRequest): AuthPrincipal {
    if (!request.principal) {
        throw AuthError.unauthenticated('Authentication required');
    }
    return request.principal;
}
