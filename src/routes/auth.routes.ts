import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { createAuthenticate, requirePrincipal } from '../middleware/auth.middleware';
import { loginSchema, parseInput, refreshBodySchema, registerBodySchema } from '../schemas/auth.schemas';
import type { CredentialService, PublicUser } from '../types/auth';
import { AuthError } from '../utils/errors';
import { successResponse } from '../utils/response';

export const REFRESH_COOKIE = 'refresh_token';
const COOKIE_PATH = '/api/v1/auth';

export interface AuthRoutesOptions {
    service: CredentialService;
    /** Refresh cookie lifetime in seconds */
    refreshCookieMaxAge: number;
    secureCookies: boolean;
}

export interface UserResponse {
    id: string;
    email: string;
    first_name: string;
    last_name: string;
    active: boolean;
    created_at: string;
    updated_at: string;
}

export function toUserResponse(user: PublicUser): UserResponse {
    return {
        id: user.id,
        email: user.email,
        first_name: user.firstName,
        last_name: user.lastName,
        active: user.active,
        created_at: user.createdAt.toISOString(),
        updated_at: user.updatedAt.toISOString(),
    };
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, opts) => {
    const { service } = opts;
    const authenticate = createAuthenticate(service);

    function setRefreshCookie(reply: FastifyReply, token: string): void {
        reply.setCookie(REFRESH_COOKIE, token, {
            httpOnly: true,
            secure: opts.secureCookies,
            sameSite: 'strict',
            path: COOKIE_PATH,
            maxAge: opts.refreshCookieMaxAge,
        });
    }

    function clearRefreshCookie(reply: FastifyReply): void {
        reply.clearCookie(REFRESH_COOKIE, { path: COOKIE_PATH });
    }

    // ─── POST /register ───
    fastify.post('/register', async (request, reply) => {
        const input = parseInput(registerBodySchema, request.body);
        const user = await service.register(input);

        reply.code(201);
        return successResponse({ user: toUserResponse(user) }, 'User registered successfully');
    });

    // ─── POST /login ───
    fastify.post('/login', async (request, reply) => {
        const { email, password } = parseInput(loginSchema, request.body);
        const result = await service.login(email, password);

        setRefreshCookie(reply, result.refreshToken);
        return successResponse(
            {
                user: toUserResponse(result.user),
                token: result.accessToken,
                refresh_token: result.refreshToken,
                expires_in: result.expiresIn,
            },
            'Login successful'
        );
    });

    // ─── POST /refresh ─── (body first, cookie as fallback)
    fastify.post('/refresh', async (request, reply) => {
        const body = parseInput(refreshBodySchema, request.body);
        const presented = body.refresh_token ?? request.cookies[REFRESH_COOKIE];
        if (!presented) {
            throw AuthError.validation('refresh_token is required');
        }

        try {
            const result = await service.refreshAccessToken(presented);
            setRefreshCookie(reply, result.refreshToken);
            return successResponse(
                {
                    token: result.accessToken,
                    refresh_token: result.refreshToken,
                    expires_in: result.expiresIn,
                },
                'Token refreshed successfully'
            );
        } catch (err) {
            if (err instanceof AuthError && err.kind === 'InvalidToken') {
                clearRefreshCookie(reply);
            }
            throw err;
        }
    });

    // ─── GET /validate ───
    fastify.get('/validate', { preHandler: authenticate }, async (request) => {
        const user = request.currentUser;
        if (!user) {
            throw AuthError.unauthenticated('Authentication required');
        }
        return successResponse({ user: toUserResponse(user) }, 'Token is valid');
    });

    // ─── GET /profile ───
    fastify.get('/profile', { preHandler: authenticate }, async (request) => {
        const principal = requirePrincipal(request);
        const user = await service.getProfile(principal.userId);
        return successResponse({ user: toUserResponse(user) }, 'User profile retrieved successfully');
    });

    // ─── POST /logout ───
    fastify.post('/logout', { preHandler: authenticate }, async (request, reply) => {
        await service.logout(requirePrincipal(request));
        clearRefreshCookie(reply);
        return successResponse(undefined, 'Logged out');
    });

    // ─── DELETE /profile ─── (soft delete)
    fastify.delete('/profile', { preHandler: authenticate }, async (request, reply) => {
        await service.deactivateAccount(requirePrincipal(request));
        clearRefreshCookie(reply);
        return successResponse(undefined, 'Account deactivated');
    });
};
