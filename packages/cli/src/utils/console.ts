/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

/**
 * Message of a caught value, whatever was thrown.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
