// ─── Error Codes ───

export const ERROR_CODES = {
    UNAUTHORIZED: 'UNAUTHORIZED',
    FORBIDDEN: 'FORBIDDEN',
    INVALID_TOKEN: 'INVALID_TOKEN',
    EXPIRED_TOKEN: 'EXPIRED_TOKEN',
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    BAD_REQUEST: 'BAD_REQUEST',
    NOT_FOUND: 'NOT_FOUND',
    ALREADY_EXISTS: 'ALREADY_EXISTS',
    CONFLICT: 'CONFLICT',
    SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
    DATABASE_ERROR: 'DATABASE_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

const HTTP_STATUS: Record<ErrorCode, number> = {
    UNAUTHORIZED: 401,
    INVALID_TOKEN: 401,
    EXPIRED_TOKEN: 401,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    VALIDATION_ERROR: 400,
    BAD_REQUEST: 400,
    ALREADY_EXISTS: 409,
    CONFLICT: 409,
    SERVICE_UNAVAILABLE: 503,
    INTERNAL_ERROR: 500,
    DATABASE_ERROR: 500,
};

export function httpStatusForCode(code: ErrorCode): number {
    return HTTP_STATUS[code];
}

// ─── Failure Taxonomy ───

export type AuthFailureKind =
    | 'InvalidCredentials'
    | 'UserExists'
    | 'UserNotFound'
    | 'InvalidToken'
    | 'Validation'
    | 'Unauthenticated'
    | 'NotFound'
    | 'Unavailable'
    | 'Internal';

/** Why a token was rejected. Kept on the error for logs; never sent to the caller. */
export type TokenFailureReason = 'malformed' | 'expired' | 'signature_mismatch' | 'superseded';

export interface AuthErrorOptions {
    kind: AuthFailureKind;
    code: ErrorCode;
    message: string;
    reason?: TokenFailureReason;
    details?: Record<string, unknown>;
    cause?: unknown;
}

export class AuthError extends Error {
    public readonly kind: AuthFailureKind;
    public readonly code: ErrorCode;
    public readonly statusCode: number;
    public readonly reason?: TokenFailureReason;
    public readonly details?: Record<string, unknown>;

    constructor(options: AuthErrorOptions) {
        super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'AuthError';
        this.kind = options.kind;
        this.code = options.code;
        this.statusCode = httpStatusForCode(options.code);
        this.reason = options.reason;
        this.details = options.details;
    }

    /** Whether the failure is the caller's (4xx) rather than ours. */
    get expose(): boolean {
        return this.statusCode < 500;
    }

    static invalidCredentials(): AuthError {
        return new AuthError({
            kind: 'InvalidCredentials',
            code: ERROR_CODES.UNAUTHORIZED,
            message: 'Invalid email or password',
        });
    }

    static userExists(): AuthError {
        return new AuthError({
            kind: 'UserExists',
            code: ERROR_CODES.ALREADY_EXISTS,
            message: 'User already exists',
        });
    }

    static userNotFound(): AuthError {
        return new AuthError({
            kind: 'UserNotFound',
            code: ERROR_CODES.NOT_FOUND,
            message: 'User not found',
        });
    }

    static invalidToken(reason: TokenFailureReason): AuthError {
        if (reason === 'expired') {
            return new AuthError({
                kind: 'InvalidToken',
                code: ERROR_CODES.EXPIRED_TOKEN,
                message: 'Token has expired',
                reason,
            });
        }
        return new AuthError({
            kind: 'InvalidToken',
            code: ERROR_CODES.INVALID_TOKEN,
            message: 'Invalid token',
            reason,
        });
    }

    static unauthenticated(message = 'Authorization header required'): AuthError {
        return new AuthError({ kind: 'Unauthenticated', code: ERROR_CODES.UNAUTHORIZED, message });
    }

    static validation(message: string, details?: Record<string, unknown>): AuthError {
        return new AuthError({ kind: 'Validation', code: ERROR_CODES.VALIDATION_ERROR, message, details });
    }

    static badRequest(message: string): AuthError {
        return new AuthError({ kind: 'Validation', code: ERROR_CODES.BAD_REQUEST, message });
    }

    static notFound(message: string): AuthError {
        return new AuthError({ kind: 'NotFound', code: ERROR_CODES.NOT_FOUND, message });
    }

    static unavailable(operation: string): AuthError {
        return new AuthError({
            kind: 'Unavailable',
            code: ERROR_CODES.SERVICE_UNAVAILABLE,
            message: 'Service temporarily unavailable',
            details: { operation },
        });
    }

    static internal(operation: string, cause?: unknown): AuthError {
        return new AuthError({
            kind: 'Internal',
            code: ERROR_CODES.INTERNAL_ERROR,
            message: 'Internal server error',
            details: { operation },
            cause,
        });
    }
}

export function isAuthError(err: unknown): err is AuthError {
    return err instanceof AuthError;
}
