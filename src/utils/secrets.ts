import { timingSafeEqual } from 'crypto';

/**
 * Constant-time comparison of a received secret against the configured one.
 */
export function secretsMatch(provided: string | undefined, expected: string): boolean {
    if (provided === undefined) {
        return false;
    }
    const providedBuffer = Buffer.from(provided, 'utf8');
    const expectedBuffer = Buffer.from(expected, 'utf8');
    if (providedBuffer.length !== expectedBuffer.length) {
        return false;
    }
    return timingSafeEqual(providedBuffer, expectedBuffer);
}
