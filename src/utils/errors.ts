/**
 * src/utils/errors.ts
 *
 * Error types the engine surfaces to its callers, plus a narrowing helper
 * for the `unknown` values caught in try/catch blocks.
 */

/**
 * Thrown when the pool has no working proxies, a refresh found none and the
 * direct connection is disabled. The current scrape attempt cannot continue
 * until an operator re-harvests or allows direct connections.
 */
export class PoolExhaustedError extends Error {
    constructor(message = 'No usable proxies: pool is empty and direct connection is disabled.') {
        super(message);
        this.name = 'PoolExhaustedError';
    }
}

/** Thrown by a driver when a navigation exceeds its time budget. */
export class NavigationTimeoutError extends Error {
    constructor(public readonly url: string, timeoutMs?: number) {
        super(
            timeoutMs === undefined
                ? `Navigation to ${url} timed out`
                : `Navigation to ${url} timed out after ${timeoutMs}ms`
        );
        this.name = 'NavigationTimeoutError';
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message || err.name;
    if (typeof err === 'string') return err;
    return String(err);
}
