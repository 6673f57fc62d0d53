import { AuthError, type ErrorCode } from './errors';

// ─── Response Envelope ───

export interface ErrorInfo {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
}

export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: ErrorInfo;
    message?: string;
}

export function successResponse<T>(data?: T, message?: string): ApiResponse<T> {
    const body: ApiResponse<T> = { success: true };
    if (data !== undefined) body.data = data;
    if (message !== undefined) body.message = message;
    return body;
}

/**
 * Server-side failures collapse to their fixed message; only caller errors
 * carry `details` (validation issues).
 */
export function errorResponse(error: AuthError): ApiResponse<never> {
    const info: ErrorInfo = { code: error.code, message: error.message };
    if (error.expose && error.details) {
        info.details = error.details;
    }
    return { success: false, error: info };
}
