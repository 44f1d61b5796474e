import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * File that marks a directory as a workspace root.
 */
export const WORKSPACE_MARKER = join('config', 'app.yaml');

/**
 * Walks up from startPath until a directory holding config/app.yaml is found.
 * Returns null when the filesystem root is reached without a match.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    for (let dir = resolve(startPath); ; dir = dirname(dir)) {
        if (existsSync(join(dir, WORKSPACE_MARKER))) {
            return dir;
        }
        if (dirname(dir) === dir) {
            return null;
        }
    }
}
