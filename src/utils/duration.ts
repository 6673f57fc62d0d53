const UNIT_SECONDS: Record<string, number> = {
    s: 1,
    m: 60,
    h: 3600,
    d: 86400,
};

/**
 * Parses an expiry such as `45s`, `15m`, `12h` or `7d` into seconds.
 * Returns null for anything else, including zero.
 */
export function parseDuration(expiry: string): number | null {
    const match = expiry.trim().match(/^(\d+)(s|m|h|d)$/);
    if (!match) return null;
    const value = parseInt(match[1], 10);
    if (value <= 0) return null;
    return value * UNIT_SECONDS[match[2]];
}
