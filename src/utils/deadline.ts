import { AuthError } from './errors';

/**
 * Runs a call to an external collaborator under a time limit.
 * Timeouts become `Unavailable`; any other non-AuthError failure becomes `Internal`.
 */
export async function withDeadline<T>(
    operation: string,
    work: () => Promise<T>,
    timeoutMs: number
): Promise<T> {
    if (timeoutMs <= 0) {
        throw AuthError.unavailable(operation);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(AuthError.unavailable(operation)), timeoutMs);
    });

    try {
        return await Promise.race([work(), timeout]);
    } catch (err) {
        if (err instanceof AuthError) throw err;
        throw AuthError.internal(operation, err);
    } finally {
        clearTimeout(timer);
    }
}

/** Milliseconds left before `deadline` (epoch ms), capped at `limitMs`. */
export function remainingTime(limitMs: number, deadline: number | undefined, now: number): number {
    if (deadline === undefined) return limitMs;
    return Math.min(limitMs, deadline - now);
}
