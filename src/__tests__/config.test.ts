import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { parseDuration } from '../utils/duration';

describe('parseDuration', () => {
    it.each([
        ['45s', 45],
        ['15m', 900],
        ['12h', 43200],
        ['7d', 604800],
        [' 2m ', 120],
    ])('should parse %j as %d seconds', (input, expected) => {
        expect(parseDuration(input)).toBe(expected);
    });

    it.each(['', '0m', '15', 'm', '1.5h', '-1d', '3w', '15 m'])('should reject %j', (input) => {
        expect(parseDuration(input)).toBeNull();
    });
});

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const config = loadConfig({});

        expect(config.httpPort).toBe(8081);
        expect(config.grpcPort).toBe(9090);
        expect(config.host).toBe('0.0.0.0');
        expect(config.accessTokenTtl).toBe(900);
        expect(config.refreshTokenTtl).toBe(604800);
        expect(config.rotateRefreshTokens).toBe(true);
        expect(config.bcryptRounds).toBe(10);
        expect(config.externalCallTimeoutMs).toBe(5000);
        expect(config.jwtRefreshSecret).toBeUndefined();
        expect(config.redisUrl).toBe('redis://localhost:6379');
        expect(config.databasePoolMax).toBe(10);
    });

    it('should read the environment', () => {
        const config = loadConfig({
            HTTP_PORT: '3000',
            GRPC_PORT: '50051',
            JWT_SECRET: 'test-secret',
            JWT_REFRESH_SECRET: 'test-refresh-secret',
            JWT_ACCESS_TOKEN_EXPIRY: '5m',
            JWT_REFRESH_TOKEN_EXPIRY: '1d',
            ROTATE_REFRESH_TOKENS: 'false',
            BCRYPT_ROUNDS: '12',
            EXTERNAL_CALL_TIMEOUT_MS: '250',
            NODE_ENV: 'production',
        });

        expect(config.httpPort).toBe(3000);
        expect(config.grpcPort).toBe(50051);
        expect(config.jwtSecret).toBe('test-secret');
        expect(config.jwtRefreshSecret).toBe('test-refresh-secret');
        expect(config.accessTokenTtl).toBe(300);
        expect(config.refreshTokenTtl).toBe(86400);
        expect(config.rotateRefreshTokens).toBe(false);
        expect(config.bcryptRounds).toBe(12);
        expect(config.externalCallTimeoutMs).toBe(250);
        expect(config.nodeEnv).toBe('production');
    });

    it('should reject an unparseable token expiry', () => {
        expect(() => loadConfig({ JWT_ACCESS_TOKEN_EXPIRY: 'soon' })).toThrow(/Invalid duration/);
    });

    it('should reject a short secret', () => {
        expect(() => loadConfig({ JWT_SECRET: 'short' })).toThrow();
    });

    it('should reject a bcrypt cost outside 4-15', () => {
        expect(() => loadConfig({ BCRYPT_ROUNDS: '31' })).toThrow();
    });
});
