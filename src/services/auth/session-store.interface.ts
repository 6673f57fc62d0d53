/**
 * Registry of the single refresh token currently honoured for each user.
 * Implementations must be atomic per key; nothing here is transactional
 * with the user directory.
 */
export interface SessionStore {
    readonly name: string;

    /**
     * Store (or replace) the user's refresh token for `ttlSeconds`.
     */
    put(userId: string, refreshToken: string, ttlSeconds: number): Promise<void>;

    /**
     * The stored refresh token, or null when absent or expired.
     */
    get(userId: string): Promise<string | null>;

    /**
     * Atomically swap `expected` for `next`. Resolves false, writing nothing,
     * when the stored token is no longer `expected`.
     */
    replace(userId: string, expected: string, next: string, ttlSeconds: number): Promise<boolean>;

    delete(userId: string): Promise<void>;

    healthCheck(): Promise<boolean>;

    close(): Promise<void>;
}
