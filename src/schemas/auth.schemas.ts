import { z } from 'zod';
import { MAX_PASSWORD_BYTES, passwordByteLength } from '../services/auth/password-hasher';
import { AuthError } from '../utils/errors';

// ─── Field Validators ───

const email = z.string().trim().email().max(255);
const passwordBytes = (value: string) => passwordByteLength(value) <= MAX_PASSWORD_BYTES;
const tooLong = `Password must be at most ${MAX_PASSWORD_BYTES} bytes`;

const newPassword = z
    .string()
    .min(6, 'Password must be at least 6 characters')
    .refine(passwordBytes, tooLong);
const name = z.string().trim().min(1).max(100);

// ─── Shared Inputs ───

export const loginSchema = z.object({
    email,
    password: z.string().min(1).refine(passwordBytes, tooLong),
});

export const tokenSchema = z.string().min(1);

// ─── Register Body (snake_case over HTTP and gRPC) ───

export const registerBodySchema = z
    .object({
        email,
        password: newPassword,
        first_name: name,
        last_name: name,
    })
    .transform((body) => ({
        email: body.email,
        password: body.password,
        firstName: body.first_name,
        lastName: body.last_name,
    }));

export const refreshBodySchema = z
    .object({
        refresh_token: tokenSchema.optional(),
    })
    .default({});

/**
 * Parses transport input, turning schema failures into a `Validation` error.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw AuthError.validation('Invalid input', parsed.error.flatten());
    }
    return parsed.data;
}

// ─── gRPC Requests (proto field names) ───

export const validateTokenRequestSchema = z.object({
    token: tokenSchema,
});

export const refreshTokenRequestSchema = z.object({
    refresh_token: tokenSchema,
});

export const getUserProfileRequestSchema = z.object({
    user_id: z.string().trim().min(1, 'user_id is required'),
});
