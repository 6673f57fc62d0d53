export { AuthService, toPublicUser } from './auth.service';
export type { AuthServiceDeps, AuthServiceOptions } from './auth.service';
export { BcryptPasswordHasher } from './password-hasher';
export type { PasswordHasher } from './password-hasher';
export { TokenCodec } from './token-codec';
export type { SessionStore } from './session-store.interface';
export type { UserDirectory } from './user-directory.interface';
export { RedisSessionStore } from './redis-session-store.adapter';
export { PgUserDirectory } from './pg-user-directory.adapter';

import { AuthService } from './auth.service';
import { BcryptPasswordHasher } from './password-hasher';
import { RedisSessionStore } from './redis-session-store.adapter';
import { PgUserDirectory } from './pg-user-directory.adapter';
import type { AppConfig } from '../../config';

export function createAuthService(config: AppConfig): { service: AuthService; sessions: RedisSessionStore } {
    const sessions = new RedisSessionStore(config.redisUrl);
    const service = new AuthService(
        {
            users: new PgUserDirectory(),
            sessions,
            hasher: new BcryptPasswordHasher(config.bcryptRounds),
        },
        {
            accessSecret: config.jwtSecret,
            refreshSecret: config.jwtRefreshSecret ?? config.jwtSecret,
            accessTokenTtl: config.accessTokenTtl,
            refreshTokenTtl: config.refreshTokenTtl,
            rotateRefreshTokens: config.rotateRefreshTokens,
            externalCallTimeoutMs: config.externalCallTimeoutMs,
        }
    );
    return { service, sessions };
}
