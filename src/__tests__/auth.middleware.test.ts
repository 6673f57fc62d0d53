import { describe, it, expect } from 'vitest';
import { extractBearerToken } from '../middleware/auth.middleware';

describe('extractBearerToken', () => {
    it.each([
        ['Bearer abc.def.ghi', 'abc.def.ghi'],
        ['bearer abc.def.ghi', 'abc.def.ghi'],
        ['BEARER   abc.def.ghi  ', 'abc.def.ghi'],
    ])('should read %j', (header, token) => {
        expect(extractBearerToken(header)).toBe(token);
    });

    it.each([undefined, '', 'Bearer', 'Bearer ', 'Basic dXNlcjpwYXNz', 'Bearer a b', 'abc.def.ghi'])(
        'should return null for %j',
        (header) => {
            expect(extractBearerToken(header)).toBeNull();
        }
    );
});
