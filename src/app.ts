import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import type { AppConfig } from './config';
import { authRoutes } from './routes/auth.routes';
import type { CredentialService } from './types/auth';
import { AuthError, isAuthError } from './utils/errors';
import { createChildLogger } from './utils/logger';
import type { ApiResponse } from './utils/response';
import { errorResponse } from './utils/response';

const log = createChildLogger('http');

export const API_PREFIX = '/api/v1/auth';

export interface BuildAppOptions {
    service: CredentialService;
    config: Pick<AppConfig, 'corsOrigin' | 'refreshTokenTtl' | 'nodeEnv'>;
}

export interface HealthReport {
    service: 'auth';
    status: 'ok' | 'degraded';
    timestamp: string;
    dependencies: {
        database: 'up' | 'down';
        sessionStore: 'up' | 'down';
    };
}

function corsOrigins(value: string | undefined): string[] | true {
    if (!value) return true;
    const origins = value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);
    return origins.length > 0 ? origins : true;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
    const { service, config } = options;

    const app = Fastify({
        logger: false, // We use pino directly
    });

    // ─── Plugins ───
    await app.register(cors, {
        origin: corsOrigins(config.corsOrigin),
        credentials: true,
    });
    await app.register(cookie);

    // ─── Error Handling ───
    app.setErrorHandler((error: FastifyError, request, reply) => {
        if (isAuthError(error)) {
            if (!error.expose) {
                log.error({ err: error, cause: error.cause, url: request.url }, error.message);
            }
            return reply.status(error.statusCode).send(errorResponse(error));
        }

        // Fastify's own 4xx (unparseable JSON, unsupported media type, body too large)
        if (error.statusCode !== undefined && error.statusCode < 500) {
            return reply.status(error.statusCode).send(errorResponse(AuthError.badRequest(error.message)));
        }

        log.error({ err: error, url: request.url }, 'Unhandled request error');
        return reply.status(500).send(errorResponse(AuthError.internal('http')));
    });

    app.setNotFoundHandler((request, reply) => {
        const notFound = AuthError.notFound(`Route ${request.method} ${request.url} not found`);
        return reply.status(404).send(errorResponse(notFound));
    });

    // ─── Routes ───
    await app.register(authRoutes, {
        prefix: API_PREFIX,
        service,
        refreshCookieMaxAge: config.refreshTokenTtl,
        secureCookies: config.nodeEnv === 'production',
    });

    // ─── Health Check ───
    app.get('/health', async (_request, reply) => {
        const status = await service.health();
        const healthy = status.database && status.sessionStore;

        const body: ApiResponse<HealthReport> = {
            success: healthy,
            data: {
                service: 'auth',
                status: healthy ? 'ok' : 'degraded',
                timestamp: new Date().toISOString(),
                dependencies: {
                    database: status.database ? 'up' : 'down',
                    sessionStore: status.sessionStore ? 'up' : 'down',
                },
            },
        };
        reply.status(healthy ? 200 : 503);
        return body;
    });

    return app;
}
