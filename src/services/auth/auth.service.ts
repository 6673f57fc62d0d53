import { v4 as uuidv4 } from 'uuid';
import type {
    AuthPrincipal,
    CallOptions,
    CredentialService,
    HealthStatus,
    LoginResult,
    PublicUser,
    RefreshResult,
    RegisterInput,
    TokenClaims,
    TokenUse,
    User,
    ValidatedToken,
} from '../../types/auth';
import { remainingTime, withDeadline } from '../../utils/deadline';
import { AuthError, isAuthError } from '../../utils/errors';
import { createChildLogger } from '../../utils/logger';
import type { PasswordHasher } from './password-hasher';
import type { SessionStore } from './session-store.interface';
import { TokenCodec } from './token-codec';
import type { UserDirectory } from './user-directory.interface';

const log = createChildLogger('auth-service');

export interface AuthServiceOptions {
    accessSecret: string;
    refreshSecret: string;
    /** Seconds */
    accessTokenTtl: number;
    /** Seconds */
    refreshTokenTtl: number;
    /** Issue and store a new refresh token on every refresh. */
    rotateRefreshTokens: boolean;
    /** Upper bound for each directory / session store call. */
    externalCallTimeoutMs: number;
    now?: () => number;
}

export interface AuthServiceDeps {
    users: UserDirectory;
    sessions: SessionStore;
    hasher: PasswordHasher;
    tokens?: TokenCodec;
}

export function toPublicUser(user: User): PublicUser {
    return {
        id: user.id,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        active: user.active,
        createdAt: user.createdAt,
        updatedAt: user.updatedAt,
    };
}

/**
 * Credential lifecycle: registration, password login, access-token validation
 * and refresh. Holds no mutable state; the user directory and the session
 * store own everything that outlives a call.
 *
 * A user has at most one honoured refresh token, the one last written to the
 * session store. Logging in again supersedes the previous one.
 */
export class AuthService implements CredentialService {
    private readonly users: UserDirectory;
    private readonly sessions: SessionStore;
    private readonly hasher: PasswordHasher;
    private readonly tokens: TokenCodec;
    private readonly now: () => number;

    constructor(deps: AuthServiceDeps, private readonly options: AuthServiceOptions) {
        this.users = deps.users;
        this.sessions = deps.sessions;
        this.hasher = deps.hasher;
        this.now = options.now ?? Date.now;
        this.tokens = deps.tokens ?? new TokenCodec(this.now);
    }

    // ─── Register ───

    async register(input: RegisterInput, options?: CallOptions): Promise<PublicUser> {
        const exists = await this.call('users.emailExists', () => this.users.emailExists(input.email), options);
        if (exists) {
            throw AuthError.userExists();
        }

        const passwordHash = await this.hashPassword(input.password);
        const user = await this.call(
            'users.create',
            () =>
                this.users.create({
                    id: uuidv4(),
                    email: input.email,
                    passwordHash,
                    firstName: input.firstName,
                    lastName: input.lastName,
                    active: true,
                }),
            options
        );

        log.info({ userId: user.id }, 'User registered');
        return toPublicUser(user);
    }

    // ─── Login ───

    async login(email: string, password: string, options?: CallOptions): Promise<LoginResult> {
        const user = await this.call('users.findByEmail', () => this.users.findByEmail(email), options);

        // Missing, inactive and wrong-password all fail the same way.
        if (!user || !user.active) {
            throw AuthError.invalidCredentials();
        }
        const valid = await this.verifyPassword(password, user.passwordHash);
        if (!valid) {
            throw AuthError.invalidCredentials();
        }

        const accessToken = this.issue(user, 'access');
        const refreshToken = this.issue(user, 'refresh');
        await this.call(
            'sessions.put',
            () => this.sessions.put(user.id, refreshToken, this.options.refreshTokenTtl),
            options
        );

        log.info({ userId: user.id }, 'User logged in');
        return {
            user: toPublicUser(user),
            accessToken,
            refreshToken,
            expiresIn: this.options.accessTokenTtl,
        };
    }

    // ─── Validate ───

    /**
     * Stateless: signature and expiry, then a fresh user lookup so a
     * deactivated account is refused even while its token is unexpired.
     */
    async validateAccessToken(token: string, options?: CallOptions): Promise<ValidatedToken> {
        const claims = this.parse(token, 'access');
        const user = await this.requireActiveUser(claims.subject, options);

        return {
            principal: {
                userId: user.id,
                email: user.email,
                tokenId: claims.tokenId,
                expiresAt: claims.expiresAt,
            },
            user: toPublicUser(user),
        };
    }

    // ─── Refresh ───

    async refreshAccessToken(refreshToken: string, options?: CallOptions): Promise<RefreshResult> {
        const claims = this.parse(refreshToken, 'refresh');

        const stored = await this.call('sessions.get', () => this.sessions.get(claims.subject), options);
        if (stored !== refreshToken) {
            log.info({ userId: claims.subject, tokenId: claims.tokenId }, 'Rejected superseded refresh token');
            throw AuthError.invalidToken('superseded');
        }

        const user = await this.requireActiveUser(claims.subject, options);
        const accessToken = this.issue(user, 'access');

        let nextRefreshToken = refreshToken;
        if (this.options.rotateRefreshTokens) {
            const rotated = this.issue(user, 'refresh');
            // A concurrent refresh with the same token may have rotated it since the read above.
            const swapped = await this.call(
                'sessions.replace',
                () => this.sessions.replace(user.id, refreshToken, rotated, this.options.refreshTokenTtl),
                options
            );
            if (!swapped) {
                log.info({ userId: user.id, tokenId: claims.tokenId }, 'Lost refresh race');
                throw AuthError.invalidToken('superseded');
            }
            nextRefreshToken = rotated;
        }

        log.debug({ userId: user.id, rotated: this.options.rotateRefreshTokens }, 'Access token refreshed');
        return {
            accessToken,
            refreshToken: nextRefreshToken,
            expiresIn: this.options.accessTokenTtl,
        };
    }

    // ─── Profile ───

    async getProfile(userId: string, options?: CallOptions): Promise<PublicUser> {
        const user = await this.requireActiveUser(userId, options);
        return toPublicUser(user);
    }

    // ─── Logout / Deactivate ───

    /** Revokes the refresh token. The access token lives until its own expiry. */
    async logout(principal: AuthPrincipal, options?: CallOptions): Promise<void> {
        await this.call('sessions.delete', () => this.sessions.delete(principal.userId), options);
        log.info({ userId: principal.userId }, 'User logged out');
    }

    async deactivateAccount(principal: AuthPrincipal, options?: CallOptions): Promise<void> {
        const changed = await this.call('users.deactivate', () => this.users.deactivate(principal.userId), options);
        if (!changed) {
            throw AuthError.userNotFound();
        }
        await this.call('sessions.delete', () => this.sessions.delete(principal.userId), options);
        log.info({ userId: principal.userId }, 'Account deactivated');
    }

    // ─── Health ───

    async health(): Promise<HealthStatus> {
        const [database, sessionStore] = await Promise.all([
            this.probe('users.healthCheck', () => this.users.healthCheck()),
            this.probe('sessions.healthCheck', () => this.sessions.healthCheck()),
        ]);
        return { database, sessionStore };
    }

    // ─── Internals ───

    private issue(user: User, use: TokenUse): string {
        const secret = use === 'access' ? this.options.accessSecret : this.options.refreshSecret;
        const ttl = use === 'access' ? this.options.accessTokenTtl : this.options.refreshTokenTtl;
        return this.tokens.issue({ subject: user.id, email: user.email, use }, secret, ttl);
    }

    private parse(token: string, use: TokenUse): TokenClaims {
        const secret = use === 'access' ? this.options.accessSecret : this.options.refreshSecret;
        const claims = this.tokens.parse(token, secret);
        if (claims.use !== use) {
            throw AuthError.invalidToken('malformed');
        }
        return claims;
    }

    private async requireActiveUser(userId: string, options?: CallOptions): Promise<User> {
        const user = await this.call('users.findById', () => this.users.findById(userId), options);
        if (!user || !user.active) {
            throw AuthError.userNotFound();
        }
        return user;
    }

    private async hashPassword(password: string): Promise<string> {
        try {
            return await this.hasher.hash(password);
        } catch (err) {
            if (isAuthError(err)) throw err;
            throw AuthError.internal('hasher.hash', err);
        }
    }

    private async verifyPassword(password: string, hash: string): Promise<boolean> {
        try {
            return await this.hasher.verify(password, hash);
        } catch (err) {
            throw AuthError.internal('hasher.verify', err);
        }
    }

    private async probe(operation: string, check: () => Promise<boolean>): Promise<boolean> {
        try {
            return await this.call(operation, check);
        } catch (err) {
            log.warn({ err, operation }, 'Health probe failed');
            return false;
        }
    }

    private call<T>(operation: string, work: () => Promise<T>, options?: CallOptions): Promise<T> {
        const timeoutMs = remainingTime(this.options.externalCallTimeoutMs, options?.deadline, this.now());
        return withDeadline(operation, work, timeoutMs);
    }
}
