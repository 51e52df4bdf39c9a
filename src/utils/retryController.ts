/**
 * src/utils/retryController.ts
 *
 * Turns a defense signal into an action for the scrape loop.
 *
 *   captcha / rate_limit / off_target / network_error
 *       → report the proxy as failed, rotate. Never retried on the same proxy.
 *   timeout
 *       → wait 2^retryCount seconds and retry, up to maxRetries;
 *         past the bound, report the proxy once and abort this URL.
 *
 * Independently of the per-URL backoff, coolDown() throttles the whole loop
 * when the rolling error count climbs above 2:
 *
 *   delay = min(30, 5 × 2^(errors − 2)) seconds
 */

import { log } from 'crawlee';
import { classifyNavigationError } from './defenseDetector.js';
import type { DefenseSignal } from './defenseDetector.js';
import { ErrorWindow } from './errorWindow.js';
import type { ProxySelection } from './proxyPool.js';
import { isDirect } from './proxyPool.js';
import { sleep as defaultSleep } from './sleep.js';
import type { Sleep } from './sleep.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type DefenseAction = 'rotate' | 'backoff_retry' | 'abort';

/** The slice of ProxyPool the controller needs. */
export interface FailureReporter {
    reportFailure(selection: ProxySelection): Promise<void>;
}

export interface RetryControllerOptions {
    /** Timeout retries allowed per URL (default 3). */
    maxRetries?: number;
    /** Unit of the exponential backoff (default 1000 ms). */
    baseDelayMs?: number;
    errorWindow?: ErrorWindow;
    sleep?: Sleep;
}

export type NavigationOutcome =
    | { ok: true; retries: number }
    | { ok: false; action: 'rotate' | 'abort'; signal: DefenseSignal };

// ─── Pure Delay Formulas ──────────────────────────────────────────────────────

export function backoffDelayMs(retryCount: number, baseDelayMs = 1000): number {
    return baseDelayMs * Math.pow(2, retryCount);
}

export function coolDownDelayMs(errorCount: number): number {
    if (errorCount <= 2) return 0;
    return Math.min(30, 5 * Math.pow(2, errorCount - 2)) * 1000;
}

function describe(selection: ProxySelection): string {
    return isDirect(selection) ? 'direct connection' : selection.address;
}

// ─── Controller ───────────────────────────────────────────────────────────────

export class RetryController {
    readonly maxRetries: number;
    readonly errorWindow: ErrorWindow;
    private readonly baseDelayMs: number;
    private readonly sleep: Sleep;

    constructor(
        private readonly pool: FailureReporter,
        options: RetryControllerOptions = {}
    ) {
        this.maxRetries = options.maxRetries ?? 3;
        this.baseDelayMs = options.baseDelayMs ?? 1000;
        this.errorWindow = options.errorWindow ?? new ErrorWindow();
        this.sleep = options.sleep ?? defaultSleep;
    }

    async handle(signal: DefenseSignal, currentProxy: ProxySelection): Promise<DefenseAction> {
        if (signal.kind !== 'timeout') {
            log.warning(
                `[RetryController] ${signal.kind} (${signal.reason}) via ${describe(currentProxy)}. Rotating proxy.`
            );
            await this.pool.reportFailure(currentProxy);
            return 'rotate';
        }

        if (signal.retryCount >= this.maxRetries) {
            log.warning(
                `[RetryController] Maximum retry attempts (${this.maxRetries}) exceeded via ${describe(currentProxy)}.`
            );
            await this.pool.reportFailure(currentProxy);
            return 'abort';
        }

        const waitMs = backoffDelayMs(signal.retryCount, this.baseDelayMs);
        log.warning(
            `[RetryController] Timeout. Retrying in ${(waitMs / 1000).toFixed(1)}s ` +
            `(attempt ${signal.retryCount + 1}/${this.maxRetries}).`
        );
        await this.sleep(waitMs);
        return 'backoff_retry';
    }

    /**
     * Runs `navigate` until it succeeds or the signal handling says stop.
     * Timeouts loop through the backoff path; any other failure ends the loop
     * with 'rotate'.
     */
    async retryNavigation(
        url: string,
        currentProxy: ProxySelection,
        navigate: () => Promise<void>
    ): Promise<NavigationOutcome> {
        for (let retryCount = 0; ; retryCount++) {
            try {
                await navigate();
                return { ok: true, retries: retryCount };
            } catch (err) {
                this.errorWindow.record();
                const signal = classifyNavigationError(err, retryCount);
                log.debug(`[RetryController] Navigation to ${url} failed: ${signal.reason}`);

                const action = await this.handle(signal, currentProxy);
                if (action !== 'backoff_retry') return { ok: false, action, signal };
            }
        }
    }

    /**
     * Sleeps when recent errors pile up. Returns the delay applied (0 when
     * below the threshold).
     */
    async coolDown(errorCount: number = this.errorWindow.count()): Promise<number> {
        const delayMs = coolDownDelayMs(errorCount);
        if (delayMs > 0) {
            log.warning(
                `[RetryController] ${errorCount} recent errors. Cooling down for ${delayMs / 1000}s.`
            );
            await this.sleep(delayMs);
        }
        return delayMs;
    }
}
