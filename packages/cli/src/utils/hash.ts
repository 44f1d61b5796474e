import { createHash } from 'node:crypto';

/**
 * SHA-256 of raw content, prefixed with 'sha256:'.
 * Recorded in the run manifest for every exported batch.
 */
export function hashContent(content: Uint8Array | string): string {
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}
