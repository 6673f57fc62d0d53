import type { NewUser, User } from '../../types/auth';

/**
 * Persistence for user records. Lookups return inactive users as well;
 * deciding what an inactive account may do is the caller's job.
 */
export interface UserDirectory {
    readonly name: string;

    /**
     * Insert a user. Rejects with `UserExists` when the email is taken.
     */
    create(user: NewUser): Promise<User>;

    findByEmail(email: string): Promise<User | null>;

    findById(id: string): Promise<User | null>;

    /**
     * True when any user, active or not, holds this email.
     */
    emailExists(email: string): Promise<boolean>;

    /**
     * Soft delete. Resolves false when no such user exists.
     */
    deactivate(id: string): Promise<boolean>;

    healthCheck(): Promise<boolean>;
}
