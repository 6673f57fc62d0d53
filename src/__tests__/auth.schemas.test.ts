import { describe, it, expect } from 'vitest';
import { loginSchema, parseInput, registerBodySchema } from '../schemas/auth.schemas';

const body = {
    email: 'ada@example.com',
    first_name: 'Ada',
    last_name: 'Lovelace',
};

describe('auth schemas', () => {
    it('should accept a 72-byte password', () => {
        const input = parseInput(registerBodySchema, { ...body, password: '€'.repeat(24) });

        expect(input.password).toBe('€'.repeat(24));
        expect(input.firstName).toBe('Ada');
    });

    it.each([
        ['ascii', 'a'.repeat(73)],
        ['multibyte', '€'.repeat(25)],
    ])('should reject an over-long %s password on register', (_kind, password) => {
        const parsed = registerBodySchema.safeParse({ ...body, password });

        expect(parsed.success).toBe(false);
        if (!parsed.success) {
            expect(parsed.error.flatten().fieldErrors.password).toEqual(['Password must be at most 72 bytes']);
        }
    });

    it.each([
        ['ascii', 'a'.repeat(73)],
        ['multibyte', '€'.repeat(25)],
    ])('should reject an over-long %s password on login', (_kind, password) => {
        expect(() => parseInput(loginSchema, { email: 'ada@example.com', password })).toThrowError('Invalid input');
    });
});
