// ─── Auth Types ───

export interface User {
    id: string;
    email: string;
    passwordHash: string;
    firstName: string;
    lastName: string;
    active: boolean;
    createdAt: Date;
    updatedAt: Date;
}

/** Safe user object; never expose passwordHash */
export type PublicUser = Omit<User, 'passwordHash'>;

export type NewUser = Omit<User, 'createdAt' | 'updatedAt'>;

export type TokenUse = 'access' | 'refresh';

/** What a caller asks the codec to sign. */
export interface TokenSubject {
    subject: string;   // user.id
    email: string;
    use: TokenUse;
}

/** What the codec recovers from a verified token. Times are unix seconds. */
export interface TokenClaims extends TokenSubject {
    tokenId: string;
    issuedAt: number;
    expiresAt: number;
}

/** Produced once by access-token validation and passed into later calls. */
export interface AuthPrincipal {
    userId: string;
    email: string;
    tokenId: string;
    expiresAt: number;
}

export interface RegisterInput {
    email: string;
    password: string;
    firstName: string;
    lastName: string;
}

export interface LoginResult {
    user: PublicUser;
    accessToken: string;
    refreshToken: string;
    /** Access token lifetime in seconds */
    expiresIn: number;
}

export interface RefreshResult {
    accessToken: string;
    refreshToken: string;
    expiresIn: number;
}

export interface ValidatedToken {
    principal: AuthPrincipal;
    user: PublicUser;
}

export interface HealthStatus {
    database: boolean;
    sessionStore: boolean;
}

export interface CallOptions {
    /** Absolute deadline (epoch ms) forwarded from the transport. */
    deadline?: number;
}

/**
 * The capability both transports are written against.
 */
export interface CredentialService {
    register(input: RegisterInput, options?: CallOptions): Promise<PublicUser>;
    login(email: string, password: string, options?: CallOptions): Promise<LoginResult>;
    validateAccessToken(token: string, options?: CallOptions): Promise<ValidatedToken>;
    refreshAccessToken(refreshToken: string, options?: CallOptions): Promise<RefreshResult>;
    getProfile(userId: string, options?: CallOptions): Promise<PublicUser>;
    logout(principal: AuthPrincipal, options?: CallOptions): Promise<void>;
    deactivateAccount(principal: AuthPrincipal, options?: CallOptions): Promise<void>;
    health(): Promise<HealthStatus>;
}
