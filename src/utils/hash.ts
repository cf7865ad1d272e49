import { createHash } from 'crypto';

/**
 * Calculate SHA-256 hash of a buffer
 */
export function hashBuffer(buffer: Uint8Array): string {
    return createHash('sha256').update(buffer).digest('hex');
}

/**
 * Generate a short hash for display purposes
 */
export function shortHash(hash: string, length: number = 8): string {
    return hash.substring(0, length);
}
