import bcrypt from 'bcryptjs';
import { AuthError } from '../../utils/errors';

export interface PasswordHasher {
    hash(password: string): Promise<string>;

    /**
     * Resolves false on mismatch; rejects only when the stored hash is unusable.
     */
    verify(password: string, hash: string): Promise<boolean>;
}

export const DEFAULT_BCRYPT_ROUNDS = 10;

/** bcrypt ignores every byte past the 72nd. */
export const MAX_PASSWORD_BYTES = 72;

export function passwordByteLength(password: string): number {
    return Buffer.byteLength(password, 'utf8');
}

export class BcryptPasswordHasher implements PasswordHasher {
    constructor(private readonly rounds: number = DEFAULT_BCRYPT_ROUNDS) {}

    async hash(password: string): Promise<string> {
        if (passwordByteLength(password) > MAX_PASSWORD_BYTES) {
            throw AuthError.validation(`Password must be at most ${MAX_PASSWORD_BYTES} bytes`);
        }
        return bcrypt.hash(password, this.rounds);
    }

    async verify(password: string, hash: string): Promise<boolean> {
        // No stored hash was made from an over-long password.
        if (passwordByteLength(password) > MAX_PASSWORD_BYTES) return false;
        return bcrypt.compare(password, hash);
    }
}
