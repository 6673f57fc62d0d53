import { Metadata, status } from '@grpc/grpc-js';
import {
    getUserProfileRequestSchema,
    loginSchema,
    parseInput,
    refreshTokenRequestSchema,
    registerBodySchema,
    validateTokenRequestSchema,
} from '../schemas/auth.schemas';
import type { CallOptions, CredentialService, PublicUser } from '../types/auth';
import { isAuthError, type ErrorCode } from '../utils/errors';

// ─── Wire Messages (auth.v1, keepCase) ───

export interface UserMessage {
    id: string;
    email: string;
    first_name: string;
    last_name: string;
    active: boolean;
    /** Unix seconds */
    created_at: number;
    updated_at: number;
}

export interface UserEnvelope {
    user: UserMessage;
}

export interface LoginResponse {
    user: UserMessage;
    access_token: string;
    refresh_token: string;
    expires_in: number;
}

export interface RefreshTokenResponse {
    access_token: string;
    refresh_token: string;
    expires_in: number;
}

function toUnixSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

export function toUserMessage(user: PublicUser): UserMessage {
    return {
        id: user.id,
        email: user.email,
        first_name: user.firstName,
        last_name: user.lastName,
        active: user.active,
        created_at: toUnixSeconds(user.createdAt),
        updated_at: toUnixSeconds(user.updatedAt),
    };
}

/**
 * The `auth.v1.AuthService` handlers, free of grpc-js call objects so they
 * can be driven directly. `server.ts` adapts them to unary calls.
 */
export class AuthGrpcController {
    constructor(private readonly service: CredentialService) {}

    async register(request: unknown, options?: CallOptions): Promise<UserEnvelope> {
        const input = parseInput(registerBodySchema, request);
        const user = await this.service.register(input, options);
        return { user: toUserMessage(user) };
    }

    async login(request: unknown, options?: CallOptions): Promise<LoginResponse> {
        const { email, password } = parseInput(loginSchema, request);
        const result = await this.service.login(email, password, options);
        return {
            user: toUserMessage(result.user),
            access_token: result.accessToken,
            refresh_token: result.refreshToken,
            expires_in: result.expiresIn,
        };
    }

    async validateToken(request: unknown, options?: CallOptions): Promise<UserEnvelope> {
        const { token } = parseInput(validateTokenRequestSchema, request);
        const { user } = await this.service.validateAccessToken(token, options);
        return { user: toUserMessage(user) };
    }

    async refreshToken(request: unknown, options?: CallOptions): Promise<RefreshTokenResponse> {
        const { refresh_token } = parseInput(refreshTokenRequestSchema, request);
        const result = await this.service.refreshAccessToken(refresh_token, options);
        return {
            access_token: result.accessToken,
            refresh_token: result.refreshToken,
            expires_in: result.expiresIn,
        };
    }

    /** Service-to-service lookup; the caller is trusted to pass a validated id. */
    async getUserProfile(request: unknown, options?: CallOptions): Promise<UserEnvelope> {
        const { user_id } = parseInput(getUserProfileRequestSchema, request);
        const user = await this.service.getProfile(user_id, options);
        return { user: toUserMessage(user) };
    }
}

// ─── Error Mapping ───

const GRPC_STATUS: Record<ErrorCode, status> = {
    UNAUTHORIZED: status.UNAUTHENTICATED,
    INVALID_TOKEN: status.UNAUTHENTICATED,
    EXPIRED_TOKEN: status.UNAUTHENTICATED,
    FORBIDDEN: status.PERMISSION_DENIED,
    NOT_FOUND: status.NOT_FOUND,
    VALIDATION_ERROR: status.INVALID_ARGUMENT,
    BAD_REQUEST: status.INVALID_ARGUMENT,
    ALREADY_EXISTS: status.ALREADY_EXISTS,
    CONFLICT: status.ALREADY_EXISTS,
    SERVICE_UNAVAILABLE: status.UNAVAILABLE,
    INTERNAL_ERROR: status.INTERNAL,
    DATABASE_ERROR: status.INTERNAL,
};

export function grpcStatusForCode(code: ErrorCode): status {
    return GRPC_STATUS[code];
}

export interface GrpcServiceError extends Error {
    code: status;
    details: string;
    metadata: Metadata;
}

/**
 * Renders a failure as a gRPC status. The envelope code travels in the
 * `error-code` trailer; anything that is not an `AuthError` becomes INTERNAL.
 */
export function toServiceError(err: unknown): GrpcServiceError {
    const code: ErrorCode = isAuthError(err) ? err.code : 'INTERNAL_ERROR';
    const message = isAuthError(err) ? err.message : 'Internal server error';

    const metadata = new Metadata();
    metadata.set('error-code', code);

    return Object.assign(new Error(message), {
        code: grpcStatusForCode(code),
        details: message,
        metadata,
    });
}
