import jwt, { type JwtPayload } from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AuthError, type TokenFailureReason } from '../../utils/errors';
import type { TokenClaims, TokenSubject } from '../../types/auth';

const ALGORITHM = 'HS256';

const SEGMENT = /^[A-Za-z0-9_-]+$/;

const payloadSchema = z.object({
    sub: z.string().min(1),
    email: z.string(),
    use: z.enum(['access', 'refresh']),
    jti: z.string().min(1),
    iat: z.number(),
    exp: z.number(),
});

const headerSchema = z.object({ alg: z.string() });

function headerDecodes(segment: string): boolean {
    try {
        return headerSchema.safeParse(JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'))).success;
    } catch {
        return false;
    }
}

/**
 * Signs and verifies HS256 JWTs. The accepted algorithm is fixed here,
 * never read from the token header.
 */
export class TokenCodec {
    constructor(private readonly now: () => number = Date.now) {}

    issue(subject: TokenSubject, secret: string, ttlSeconds: number): string {
        if (!(ttlSeconds > 0)) {
            throw new RangeError(`Token TTL must be positive, got ${ttlSeconds}`);
        }
        const iat = Math.floor(this.now() / 1000);
        return jwt.sign(
            {
                sub: subject.subject,
                email: subject.email,
                use: subject.use,
                jti: uuidv4(),
                iat,
                // Whole seconds, rounded up so a sub-second TTL still outlives its issue second.
                exp: iat + Math.ceil(ttlSeconds),
            },
            secret,
            { algorithm: ALGORITHM }
        );
    }

    parse(token: string, secret: string): TokenClaims {
        const segments = token.split('.');
        if (segments.length !== 3 || !segments.every((s) => SEGMENT.test(s))) {
            throw AuthError.invalidToken('malformed');
        }

        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, secret, {
                algorithms: [ALGORITHM],
                clockTimestamp: Math.floor(this.now() / 1000),
            });
        } catch (err) {
            throw AuthError.invalidToken(classifyVerifyError(err, segments[0]));
        }

        const claims = payloadSchema.safeParse(decoded);
        if (!claims.success) {
            throw AuthError.invalidToken('malformed');
        }

        return {
            subject: claims.data.sub,
            email: claims.data.email,
            use: claims.data.use,
            tokenId: claims.data.jti,
            issuedAt: claims.data.iat,
            expiresAt: claims.data.exp,
        };
    }
}

function classifyVerifyError(err: unknown, headerSegment: string): TokenFailureReason {
    // TokenExpiredError is only raised once the signature has verified.
    if (err instanceof jwt.TokenExpiredError) return 'expired';
    if (err instanceof jwt.JsonWebTokenError) {
        if (err.message === 'invalid signature' || err.message === 'invalid algorithm') {
            return 'signature_mismatch';
        }
        return 'malformed';
    }
    // The payload failed to decode. Under an intact header that means the
    // signed bytes were altered.
    return headerDecodes(headerSegment) ? 'signature_mismatch' : 'malformed';
}
