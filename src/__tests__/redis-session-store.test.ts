import { beforeEach, describe, it, expect, vi } from 'vitest';
import { RedisSessionStore } from '../services/auth/redis-session-store.adapter';

const client = vi.hoisted(() => ({
    on: vi.fn(),
    connect: vi.fn(),
    set: vi.fn(),
    get: vi.fn(),
    del: vi.fn(),
    eval: vi.fn(),
    ping: vi.fn(),
    quit: vi.fn(),
}));

vi.mock('redis', () => ({
    createClient: vi.fn(() => client),
}));

describe('RedisSessionStore', () => {
    beforeEach(() => {
        for (const fn of Object.values(client)) fn.mockReset();
        client.connect.mockResolvedValue(undefined);
    });

    it('should store the token under the user key with a whole-second expiry', async () => {
        const store = new RedisSessionStore('redis://localhost:6379');

        await store.put('user-1', 'token-a', 604800.4);

        expect(client.set).toHaveBeenCalledWith('refresh_token:user-1', 'token-a', { EX: 604801 });
    });

    it('should swap the token only when it still holds the expected one', async () => {
        const store = new RedisSessionStore('redis://localhost:6379');
        client.eval.mockResolvedValueOnce(1).mockResolvedValueOnce(0);

        await expect(store.replace('user-1', 'token-a', 'token-b', 60)).resolves.toBe(true);
        await expect(store.replace('user-1', 'token-a', 'token-c', 60)).resolves.toBe(false);

        expect(client.eval).toHaveBeenNthCalledWith(1, expect.stringContaining("redis.call('GET', KEYS[1]) == ARGV[1]"), {
            keys: ['refresh_token:user-1'],
            arguments: ['token-a', 'token-b', '60'],
        });
    });

    it('should connect once across calls', async () => {
        const store = new RedisSessionStore('redis://localhost:6379');
        client.get.mockResolvedValue('token-a');

        await expect(store.get('user-1')).resolves.toBe('token-a');
        await store.delete('user-1');

        expect(client.connect).toHaveBeenCalledTimes(1);
        expect(client.get).toHaveBeenCalledWith('refresh_token:user-1');
        expect(client.del).toHaveBeenCalledWith('refresh_token:user-1');
    });

    it('should retry connecting after a failed attempt', async () => {
        const store = new RedisSessionStore('redis://localhost:6379');
        client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED')).mockResolvedValueOnce(undefined);
        client.get.mockResolvedValue(null);

        await expect(store.get('user-1')).rejects.toThrow('ECONNREFUSED');
        await expect(store.get('user-1')).resolves.toBeNull();
        expect(client.connect).toHaveBeenCalledTimes(2);
    });

    it('should report health from PING', async () => {
        const store = new RedisSessionStore('redis://localhost:6379');
        client.ping.mockResolvedValueOnce('PONG').mockRejectedValueOnce(new Error('timeout'));

        await expect(store.healthCheck()).resolves.toBe(true);
        await expect(store.healthCheck()).resolves.toBe(false);
    });

    it('should quit only a connected client', async () => {
        const store = new RedisSessionStore('redis://localhost:6379');
        await store.close();
        expect(client.quit).not.toHaveBeenCalled();

        await store.get('user-1');
        await store.close();
        expect(client.quit).toHaveBeenCalledTimes(1);
    });
});
