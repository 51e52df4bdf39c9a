/**
 * src/session.ts
 *
 * ProxiedSession: one scrape loop's view of the resilience engine.
 *
 * Holds the current proxy selection and the driver opened through it, and
 * turns every page visit into:
 *
 *   navigate (with timeout backoff) → observe → classify → act
 *
 * A selection is reported to the pool exactly once: as a failure when a
 * defense signal burns it, or as a success when the session moves on from it
 * cleanly (rotation, listing quota, close).
 */

import { log } from 'crawlee';
import { observePage } from './browser/pageObserver.js';
import type { PageExpectations } from './browser/pageObserver.js';
import type { BrowserDriver, BrowserDriverFactory } from './browser/types.js';
import { classifyDefense } from './utils/defenseDetector.js';
import type { DefenseRules, DefenseSignal, ObservedPage } from './utils/defenseDetector.js';
import { errorMessage } from './utils/errors.js';
import { isDirect } from './utils/proxyPool.js';
import type { ProxySelection } from './utils/proxyPool.js';
import { RetryController } from './utils/retryController.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** The slice of ProxyPool a session drives. */
export interface SessionPool {
    acquire(): Promise<ProxySelection>;
    reportSuccess(selection: ProxySelection): Promise<void>;
    reportFailure(selection: ProxySelection): Promise<void>;
}

export interface ProxiedSessionOptions {
    pool: SessionPool;
    driverFactory: BrowserDriverFactory;
    /** Defaults to a controller reporting into `pool`. */
    controller?: RetryController;
    rules?: Partial<DefenseRules>;
    expectations?: Omit<PageExpectations, 'timedOut'>;
    /** Proxy switches allowed per visit() before giving up (default 3). */
    maxRotations?: number;
    /** Rotate after this many listings on one proxy; 0 never rotates (default 0). */
    listingsPerProxy?: number;
    navigationTimeoutMs?: number;
}

export type VisitResult =
    | { ok: true; url: string; page: ObservedPage; driver: BrowserDriver }
    | { ok: false; url: string; reason: string; signal?: DefenseSignal };

interface ActiveConnection {
    selection: ProxySelection;
    driver: BrowserDriver;
}

function describe(selection: ProxySelection): string {
    return isDirect(selection) ? 'direct connection' : selection.address;
}

// ─── Session ──────────────────────────────────────────────────────────────────

export class ProxiedSession {
    private readonly pool: SessionPool;
    private readonly driverFactory: BrowserDriverFactory;
    private readonly controller: RetryController;
    private readonly rules: Partial<DefenseRules>;
    private readonly expectations: Omit<PageExpectations, 'timedOut'>;
    private readonly maxRotations: number;
    private readonly listingsPerProxy: number;
    private readonly navigationTimeoutMs: number;

    private selection: ProxySelection | null = null;
    private driver: BrowserDriver | null = null;
    private reported = false;
    private listingsOnProxy = 0;

    constructor(options: ProxiedSessionOptions) {
        this.pool = options.pool;
        this.driverFactory = options.driverFactory;
        this.controller = options.controller ?? new RetryController(options.pool);
        this.rules = options.rules ?? {};
        this.expectations = {
            targetPattern: options.rules?.targetPattern,
            ...options.expectations,
        };
        this.maxRotations = options.maxRotations ?? 3;
        this.listingsPerProxy = options.listingsPerProxy ?? 0;
        this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30_000;
    }

    get currentSelection(): ProxySelection | null {
        return this.selection;
    }

    get currentDriver(): BrowserDriver | null {
        return this.driver;
    }

    /**
     * Drops the current driver and opens a new one through the next pool
     * selection. Resolves false when the driver cannot be opened (the
     * selection is reported as failed). Rejects with PoolExhaustedError when
     * the pool has nothing left to hand out.
     */
    async rotate(): Promise<boolean> {
        await this.release();

        const selection = await this.pool.acquire();
        this.selection = selection;
        this.reported = false;
        this.listingsOnProxy = 0;

        try {
            this.driver = await this.driverFactory(selection);
        } catch (err) {
            log.error(`[Session] Failed to open browser via ${describe(selection)}: ${errorMessage(err)}`);
            await this.markFailed(selection);
            return false;
        }

        if (isDirect(selection)) log.warning('[Session] Using direct connection (no proxy).');
        else log.info(`[Session] Switched to proxy ${selection.address}.`);
        return true;
    }

    /**
     * Loads `url` and checks the page for defenses, rotating through up to
     * `maxRotations` proxies. A timeout that outlasts its retries aborts the
     * URL without further rotation.
     */
    async visit(url: string): Promise<VisitResult> {
        let lastSignal: DefenseSignal | undefined;

        for (let attempt = 0; attempt <= this.maxRotations; attempt++) {
            const active = await this.connection();
            if (!active) continue;
            const { selection, driver } = active;

            const nav = await this.controller.retryNavigation(url, selection, () =>
                driver.navigate(url, this.navigationTimeoutMs)
            );
            if (!nav.ok) {
                this.reported = true;
                await this.dropDriver();
                if (nav.action === 'abort') {
                    return { ok: false, url, reason: nav.signal.reason, signal: nav.signal };
                }
                lastSignal = nav.signal;
                await this.controller.coolDown();
                continue;
            }

            const page = await observePage(driver, this.expectations);
            const signal = classifyDefense(page, this.rules);
            if (!signal) return { ok: true, url, page, driver };

            // Page signals are never timeouts; handle() reports the proxy and rotates.
            lastSignal = signal;
            this.controller.errorWindow.record();
            await this.controller.handle(signal, selection);

            this.reported = true;
            await this.dropDriver();
            await this.controller.coolDown();
        }

        log.error(`[Session] Giving up on ${url} after ${this.maxRotations} proxy rotations.`);
        return {
            ok: false,
            url,
            reason: `gave up after ${this.maxRotations} proxy rotations`,
            signal: lastSignal,
        };
    }

    /**
     * Counts one scraped listing against the current proxy and rotates once
     * the quota is reached. Resolves true when a rotation happened.
     */
    async noteListing(): Promise<boolean> {
        this.listingsOnProxy++;
        if (this.listingsPerProxy <= 0 || this.listingsOnProxy < this.listingsPerProxy) return false;

        log.info(`[Session] ${this.listingsOnProxy} listings on this proxy. Rotating.`);
        await this.rotate();
        return true;
    }

    async close(): Promise<void> {
        await this.release();
    }

    // ── Internals ───────────────────────────────────────────────────────────

    private async connection(): Promise<ActiveConnection | null> {
        if (!this.driver || !this.selection) {
            const opened = await this.rotate();
            if (!opened) return null;
        }
        if (!this.driver || !this.selection) return null;
        return { selection: this.selection, driver: this.driver };
    }

    private async markFailed(selection: ProxySelection): Promise<void> {
        this.reported = true;
        await this.pool.reportFailure(selection);
    }

    /** Closes the driver and settles the current selection as a success if nothing else did. */
    private async release(): Promise<void> {
        await this.dropDriver();
        if (this.selection && !this.reported) {
            await this.pool.reportSuccess(this.selection);
        }
        this.selection = null;
        this.reported = false;
    }

    private async dropDriver(): Promise<void> {
        const driver = this.driver;
        this.driver = null;
        if (!driver) return;
        try {
            await driver.close();
        } catch (err) {
            log.warning(`[Session] Error closing browser: ${errorMessage(err)}`);
        }
    }
}
