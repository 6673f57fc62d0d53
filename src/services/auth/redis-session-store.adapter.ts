import { createClient } from 'redis';
import type { SessionStore } from './session-store.interface';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger('redis-session-store');

type RedisClient = ReturnType<typeof createClient>;

export const REFRESH_KEY_PREFIX = 'refresh_token:';

// KEYS[1] session key; ARGV expected token, next token, ttl seconds
const REPLACE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
    redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[3])
    return 1
end
return 0`;

function expirySeconds(ttlSeconds: number): number {
    return Math.max(1, Math.ceil(ttlSeconds));
}

/**
 * Session store on Redis: one `refresh_token:<userId>` string key per user,
 * expiring with the refresh token it holds.
 */
export class RedisSessionStore implements SessionStore {
    readonly name = 'redis';
    private client: RedisClient;
    private connecting: Promise<unknown> | null = null;

    constructor(url: string) {
        this.client = createClient({ url });
        this.client.on('error', (err) => {
            log.error({ err }, 'Redis client error');
        });
    }

    private ensureConnected(): Promise<unknown> {
        if (!this.connecting) {
            this.connecting = this.client.connect().catch((err: unknown) => {
                this.connecting = null;
                throw err;
            });
        }
        return this.connecting;
    }

    private key(userId: string): string {
        return `${REFRESH_KEY_PREFIX}${userId}`;
    }

    async put(userId: string, refreshToken: string, ttlSeconds: number): Promise<void> {
        await this.ensureConnected();
        await this.client.set(this.key(userId), refreshToken, { EX: expirySeconds(ttlSeconds) });
    }

    async replace(userId: string, expected: string, next: string, ttlSeconds: number): Promise<boolean> {
        await this.ensureConnected();
        const swapped = await this.client.eval(REPLACE_SCRIPT, {
            keys: [this.key(userId)],
            arguments: [expected, next, String(expirySeconds(ttlSeconds))],
        });
        return swapped === 1;
    }

    async get(userId: string): Promise<string | null> {
        await this.ensureConnected();
        return this.client.get(this.key(userId));
    }

    async delete(userId: string): Promise<void> {
        await this.ensureConnected();
        await this.client.del(this.key(userId));
    }

    async healthCheck(): Promise<boolean> {
        try {
            await this.ensureConnected();
            await this.client.ping();
            return true;
        } catch (err) {
            log.warn({ err }, 'Redis health check failed');
            return false;
        }
    }

    async close(): Promise<void> {
        if (this.connecting) {
            this.connecting = null;
            await this.client.quit();
        }
    }
}
