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

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function failure(message: string): void {
    console.error(`✖ ${message}`);
}

/**
 * Print an error and exit with status 1.
 */
export function fail(message: string, hint?: string): never {
    console.error(`\n✖ Error: ${message}`);
    if (hint) {
        console.error(hint);
    }
    process.exit(1);
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
