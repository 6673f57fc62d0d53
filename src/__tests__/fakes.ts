import type { PasswordHasher } from '../services/auth/password-hasher';
import type { SessionStore } from '../services/auth/session-store.interface';
import type { UserDirectory } from '../services/auth/user-directory.interface';
import type { NewUser, User } from '../types/auth';
import { AuthError } from '../utils/errors';

// ─── Clock ───

export class FakeClock {
    constructor(public current: number = Date.UTC(2024, 0, 1, 12, 0, 0)) {}

    now = (): number => this.current;

    advanceSeconds(seconds: number): void {
        this.current += seconds * 1000;
    }
}

// ─── User Directory ───

export class InMemoryUserDirectory implements UserDirectory {
    readonly name = 'memory';
    readonly users = new Map<string, User>();

    constructor(private readonly clock: FakeClock = new FakeClock()) {}

    async create(user: NewUser): Promise<User> {
        if ([...this.users.values()].some((u) => u.email === user.email)) {
            throw AuthError.userExists();
        }
        const at = new Date(this.clock.now());
        const created: User = { ...user, createdAt: at, updatedAt: at };
        this.users.set(created.id, created);
        return created;
    }

    async findByEmail(email: string): Promise<User | null> {
        return [...this.users.values()].find((u) => u.email === email) ?? null;
    }

    async findById(id: string): Promise<User | null> {
        return this.users.get(id) ?? null;
    }

    async emailExists(email: string): Promise<boolean> {
        return [...this.users.values()].some((u) => u.email === email);
    }

    async deactivate(id: string): Promise<boolean> {
        const user = this.users.get(id);
        if (!user) return false;
        this.users.set(id, { ...user, active: false, updatedAt: new Date(this.clock.now()) });
        return true;
    }

    async healthCheck(): Promise<boolean> {
        return true;
    }
}

// ─── Session Store ───

export class InMemorySessionStore implements SessionStore {
    readonly name = 'memory';
    readonly entries = new Map<string, { token: string; expiresAt: number }>();

    constructor(private readonly clock: FakeClock = new FakeClock()) {}

    async put(userId: string, refreshToken: string, ttlSeconds: number): Promise<void> {
        this.entries.set(userId, { token: refreshToken, expiresAt: this.clock.now() + ttlSeconds * 1000 });
    }

    async get(userId: string): Promise<string | null> {
        return this.current(userId);
    }

    private current(userId: string): string | null {
        const entry = this.entries.get(userId);
        if (!entry) return null;
        if (entry.expiresAt <= this.clock.now()) {
            this.entries.delete(userId);
            return null;
        }
        return entry.token;
    }

    async replace(userId: string, expected: string, next: string, ttlSeconds: number): Promise<boolean> {
        if (this.current(userId) !== expected) return false;
        this.entries.set(userId, { token: next, expiresAt: this.clock.now() + ttlSeconds * 1000 });
        return true;
    }

    async delete(userId: string): Promise<void> {
        this.entries.delete(userId);
    }

    async healthCheck(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> {
        this.entries.clear();
    }
}

// ─── Password Hasher ───

/** Reversible stand-in; bcrypt itself is covered in password-hasher.test.ts. */
export class PlainPasswordHasher implements PasswordHasher {
    async hash(password: string): Promise<string> {
        return `hashed:${password}`;
    }

    async verify(password: string, hash: string): Promise<boolean> {
        return hash === `hashed:${password}`;
    }
}

/** A promise that never settles, for deadline tests. */
export function never<T>(): Promise<T> {
    return new Promise<T>(() => undefined);
}
