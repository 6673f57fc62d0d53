import pino from 'pino';
import { config } from '../config';

/**
 * Paths scrubbed from every log line. Credentials and tokens reach the
 * service in request bodies, RPC messages and headers.
 */
const REDACT_PATHS = [
    'password',
    'passwordHash',
    'token',
    'accessToken',
    'refreshToken',
    'refresh_token',
    'req.headers.authorization',
    'req.headers.cookie',
];

function defaultLevel(): pino.LevelWithSilent {
    switch (config.nodeEnv) {
        case 'production':
            return 'info';
        case 'test':
            return 'silent';
        default:
            return 'debug';
    }
}

function prettyTransport(): pino.TransportSingleOptions | undefined {
    if (config.nodeEnv !== 'development') return undefined;
    try {
        require.resolve('pino-pretty');
    } catch {
        return undefined;
    }
    return { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } };
}

export const logger = pino({
    level: config.logLevel ?? defaultLevel(),
    base: { service: 'auth-service' },
    serializers: { err: pino.stdSerializers.err },
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    transport: prettyTransport(),
});

export type Logger = pino.Logger;

/** Component-scoped child, e.g. `createChildLogger('redis-session-store')`. */
export function createChildLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
    return logger.child({ component, ...bindings });
}
