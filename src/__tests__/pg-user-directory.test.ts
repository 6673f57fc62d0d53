import { beforeEach, describe, it, expect, vi } from 'vitest';
import { query, queryOne } from '../db';
import { PgUserDirectory, type UserRow } from '../services/auth/pg-user-directory.adapter';

vi.mock('../db', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../db')>();
    return { ...actual, query: vi.fn(), queryOne: vi.fn() };
});

const mockedQuery = vi.mocked(query);
const mockedQueryOne = vi.mocked(queryOne);

const row: UserRow = {
    id: 'user-1',
    email: 'ada@example.com',
    password: 'hashed',
    first_name: 'Ada',
    last_name: null,
    active: true,
    created_at: new Date('2024-01-01T00:00:00Z'),
    updated_at: new Date('2024-01-02T00:00:00Z'),
};

describe('PgUserDirectory', () => {
    const directory = new PgUserDirectory();

    beforeEach(() => {
        mockedQuery.mockReset();
        mockedQueryOne.mockReset();
    });

    it('should insert a user and map the returned row', async () => {
        mockedQuery.mockResolvedValue([row]);

        const user = await directory.create({
            id: 'user-1',
            email: 'ada@example.com',
            passwordHash: 'hashed',
            firstName: 'Ada',
            lastName: '',
            active: true,
        });

        expect(user).toEqual({
            id: 'user-1',
            email: 'ada@example.com',
            passwordHash: 'hashed',
            firstName: 'Ada',
            lastName: '',
            active: true,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
        });
        expect(mockedQuery.mock.calls[0][1]).toEqual(['user-1', 'ada@example.com', 'hashed', 'Ada', '', true]);
    });

    it('should turn a unique violation into UserExists', async () => {
        mockedQuery.mockRejectedValue(Object.assign(new Error('duplicate key'), { code: '23505' }));

        await expect(
            directory.create({
                id: 'user-2',
                email: 'ada@example.com',
                passwordHash: 'hashed',
                firstName: 'Ada',
                lastName: 'Lovelace',
                active: true,
            })
        ).rejects.toMatchObject({ kind: 'UserExists' });
    });

    it('should find by email and return null when absent', async () => {
        mockedQueryOne.mockResolvedValueOnce(row).mockResolvedValueOnce(null);

        await expect(directory.findByEmail('ada@example.com')).resolves.toMatchObject({ id: 'user-1' });
        await expect(directory.findByEmail('nobody@example.com')).resolves.toBeNull();
        expect(mockedQueryOne.mock.calls[0][1]).toEqual(['ada@example.com']);
    });

    it('should read the EXISTS flag', async () => {
        mockedQueryOne.mockResolvedValue({ exists: true });

        await expect(directory.emailExists('ada@example.com')).resolves.toBe(true);
    });

    it('should report whether deactivate changed a row', async () => {
        mockedQuery.mockResolvedValueOnce([{ id: 'user-1' }]).mockResolvedValueOnce([]);

        await expect(directory.deactivate('user-1')).resolves.toBe(true);
        await expect(directory.deactivate('missing')).resolves.toBe(false);
    });

    it('should report an unreachable database as unhealthy', async () => {
        mockedQuery.mockRejectedValue(new Error('ECONNREFUSED'));

        await expect(directory.healthCheck()).resolves.toBe(false);
    });
});
