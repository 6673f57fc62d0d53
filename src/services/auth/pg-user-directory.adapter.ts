import { hasPgCode, PG_ERROR_CODES, query, queryOne } from '../../db';
import type { NewUser, User } from '../../types/auth';
import { AuthError } from '../../utils/errors';
import { createChildLogger } from '../../utils/logger';
import type { UserDirectory } from './user-directory.interface';

const log = createChildLogger('pg-user-directory');

const USER_COLUMNS = 'id, email, password, first_name, last_name, active, created_at, updated_at';

export interface UserRow {
    id: string;
    email: string;
    password: string;
    first_name: string | null;
    last_name: string | null;
    active: boolean;
    created_at: Date;
    updated_at: Date;
}

function toUser(row: UserRow): User {
    return {
        id: row.id,
        email: row.email,
        passwordHash: row.password,
        firstName: row.first_name ?? '',
        lastName: row.last_name ?? '',
        active: row.active,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export class PgUserDirectory implements UserDirectory {
    readonly name = 'postgres';

    async create(user: NewUser): Promise<User> {
        let rows: UserRow[];
        try {
            rows = await query<UserRow>(
                `INSERT INTO users (id, email, password, first_name, last_name, active)
                 VALUES ($1, $2, $3, $4, $5, $6)
                 RETURNING ${USER_COLUMNS}`,
                [user.id, user.email, user.passwordHash, user.firstName, user.lastName, user.active]
            );
        } catch (err) {
            // Lost a race with a concurrent registration for the same email.
            if (hasPgCode(err, PG_ERROR_CODES.UNIQUE_VIOLATION)) throw AuthError.userExists();
            throw err;
        }

        const row = rows[0];
        if (!row) {
            throw new Error('INSERT INTO users returned no row');
        }
        return toUser(row);
    }

    async findByEmail(email: string): Promise<User | null> {
        const row = await queryOne<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [email]);
        return row ? toUser(row) : null;
    }

    async findById(id: string): Promise<User | null> {
        const row = await queryOne<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
        return row ? toUser(row) : null;
    }

    async emailExists(email: string): Promise<boolean> {
        const row = await queryOne<{ exists: boolean }>(
            'SELECT EXISTS(SELECT 1 FROM users WHERE email = $1) AS exists',
            [email]
        );
        return row?.exists === true;
    }

    async deactivate(id: string): Promise<boolean> {
        const rows = await query<{ id: string }>(
            'UPDATE users SET active = false, updated_at = NOW() WHERE id = $1 RETURNING id',
            [id]
        );
        return rows.length > 0;
    }

    async healthCheck(): Promise<boolean> {
        try {
            await query('SELECT 1');
            return true;
        } catch (err) {
            log.warn({ err }, 'Database health check failed');
            return false;
        }
    }
}
