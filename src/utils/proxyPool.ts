/**
 * src/utils/proxyPool.ts
 *
 * Live rotation state for the scrape loops.
 *
 * The pool owns four pieces of state: the working list (rotation order), the
 * blacklist, the rotation cursor and the consecutive-failure counter. Every
 * public operation runs inside one mutex, so two loops sharing a pool never
 * receive the same cursor slot or skip one.
 *
 * Per-proxy lifecycle:   tested → working → blacklisted
 * A blacklisted address only comes back through a later refresh() that
 * re-tests it successfully. The snapshot seeds the first generation only;
 * once this pool has loaded or harvested, an empty working list means a
 * new harvest.
 */

import { Mutex } from 'async-mutex';
import { log } from 'crawlee';
import { PoolExhaustedError, errorMessage } from './errors.js';
import type { PoolSnapshot, PoolStateStore } from './poolStateStore.js';
import type { ProxyRecord } from './proxyValidator.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface DirectConnection {
    readonly direct: true;
}

/** Designated "no proxy" selection. */
export const DIRECT_CONNECTION: DirectConnection = Object.freeze({ direct: true });

export type ProxySelection = ProxyRecord | DirectConnection;

export function isDirect(selection: ProxySelection): selection is DirectConnection {
    return 'direct' in selection && selection.direct === true;
}

/** Produces a fresh ranked list of working proxies. */
export interface Harvester {
    harvest(): Promise<ProxyRecord[]>;
}

export interface ProxyPoolOptions {
    /** Consecutive failures before the direct connection takes over (default 3). */
    maxFailures?: number;
    /** Whether the direct connection may be handed out at all (default true). */
    allowDirect?: boolean;
    /** Snapshots older than this are ignored by load() (default 24h). */
    maxSnapshotAgeMs?: number;
    now?: () => number;
}

export interface PoolStatus {
    working: string[];
    blacklisted: string[];
    cursor: number;
    consecutiveFailures: number;
    maxFailures: number;
    allowDirect: boolean;
    lastPersistedAt: string | null;
    harvestedAt: string | null;
}

// ─── Pool Manager ─────────────────────────────────────────────────────────────

export class ProxyPool {
    private working: ProxyRecord[] = [];
    private readonly blacklisted = new Map<string, ProxyRecord>();
    private cursor = 0;
    private consecutiveFailures = 0;
    private lastPersistedAt: string | null = null;
    private harvestedAt: string | null = null;

    private readonly lock = new Mutex();
    private readonly maxFailures: number;
    private readonly allowDirect: boolean;
    private readonly maxSnapshotAgeMs: number;
    private readonly now: () => number;

    constructor(
        private readonly store: PoolStateStore,
        private readonly harvester: Harvester,
        options: ProxyPoolOptions = {}
    ) {
        this.maxFailures = options.maxFailures ?? 3;
        this.allowDirect = options.allowDirect ?? true;
        this.maxSnapshotAgeMs = options.maxSnapshotAgeMs ?? 24 * 60 * 60 * 1000;
        this.now = options.now ?? Date.now;
    }

    // ── Public API ──────────────────────────────────────────────────────────

    /**
     * Restores state from the last snapshot if its harvest is fresh and it
     * still has working proxies. Returns false when a harvest is needed
     * instead. Addresses this pool has already blacklisted stay blacklisted.
     */
    load(): Promise<boolean> {
        return this.lock.runExclusive(() => this.loadLocked());
    }

    /**
     * Hands out the proxy at the cursor and advances it (wrapping).
     * Returns the direct sentinel after too many consecutive failures, and
     * null only when nothing is usable and direct connections are disabled.
     */
    nextProxy(): Promise<ProxySelection | null> {
        return this.lock.runExclusive(async () => {
            if (this.consecutiveFailures >= this.maxFailures && this.allowDirect) {
                log.warning(
                    `[ProxyPool] Using direct connection after ${this.consecutiveFailures} consecutive proxy failures.`
                );
                return DIRECT_CONNECTION;
            }

            if (this.working.length === 0) {
                const restored = this.harvestedAt === null && (await this.loadLocked());
                if (!restored) await this.refreshLocked();
            }

            if (this.working.length === 0) {
                if (this.allowDirect) {
                    log.warning('[ProxyPool] No working proxies available. Using direct connection.');
                    return DIRECT_CONNECTION;
                }
                log.error('[ProxyPool] No working proxies available and direct connection is disabled.');
                return null;
            }

            if (this.cursor >= this.working.length) this.cursor = 0;
            const proxy = this.working[this.cursor];
            this.cursor = (this.cursor + 1) % this.working.length;
            return proxy;
        });
    }

    /** Same as nextProxy(), but pool exhaustion is an error. */
    async acquire(): Promise<ProxySelection> {
        const selection = await this.nextProxy();
        if (selection === null) throw new PoolExhaustedError();
        return selection;
    }

    reportSuccess(_selection?: ProxySelection): Promise<void> {
        return this.lock.runExclusive(() => {
            this.consecutiveFailures = 0;
        });
    }

    /**
     * Counts the failure and moves the proxy to the blacklist. The snapshot is
     * written before this resolves.
     */
    reportFailure(selection: ProxySelection): Promise<void> {
        return this.lock.runExclusive(async () => {
            this.consecutiveFailures++;
            if (isDirect(selection)) return;

            const index = this.working.findIndex((p) => p.address === selection.address);
            if (index === -1) return; // already blacklisted, or from another generation

            const [removed] = this.working.splice(index, 1);
            this.blacklisted.set(removed.address, removed);

            // Keep the cursor on the record that would have come next.
            if (index < this.cursor) this.cursor--;
            if (this.cursor >= this.working.length) this.cursor = 0;

            log.info(
                `[ProxyPool] Blacklisted ${removed.address} ` +
                `(${this.working.length} working, ${this.blacklisted.size} blacklisted).`
            );
            await this.persistLocked();
        });
    }

    /** Re-harvests and, when anything survives, replaces the working list. */
    refresh(): Promise<boolean> {
        return this.lock.runExclusive(() => this.refreshLocked());
    }

    getStatus(): Promise<PoolStatus> {
        return this.lock.runExclusive(() => ({
            working: this.working.map((p) => p.address),
            blacklisted: [...this.blacklisted.keys()],
            cursor: this.cursor,
            consecutiveFailures: this.consecutiveFailures,
            maxFailures: this.maxFailures,
            allowDirect: this.allowDirect,
            lastPersistedAt: this.lastPersistedAt,
            harvestedAt: this.harvestedAt,
        }));
    }

    /** Copies of the working records in rotation order. */
    getWorking(): Promise<ProxyRecord[]> {
        return this.lock.runExclusive(() => this.working.map((p) => ({ ...p })));
    }

    // ── Internals (caller holds the lock) ───────────────────────────────────

    private async loadLocked(): Promise<boolean> {
        const snapshot = await this.store.load();
        if (!snapshot) return false;

        const ageMs = this.now() - Date.parse(snapshot.harvestedAt);
        if (ageMs > this.maxSnapshotAgeMs) {
            log.info(`[ProxyPool] Cached pool harvested at ${snapshot.harvestedAt} is older than the freshness window.`);
            return false;
        }

        const working = snapshot.working_proxies.filter((p) => !this.blacklisted.has(p.address));
        if (working.length === 0) return false;

        this.working = working.map((p) => ({ ...p }));
        const workingAddresses = new Set(this.working.map((p) => p.address));
        for (const p of snapshot.blacklisted_proxies) {
            if (!workingAddresses.has(p.address) && !this.blacklisted.has(p.address)) {
                this.blacklisted.set(p.address, { ...p });
            }
        }
        this.cursor = 0;
        this.lastPersistedAt = snapshot.timestamp;
        this.harvestedAt = snapshot.harvestedAt;

        log.info(
            `[ProxyPool] Restored ${this.working.length} working and ` +
            `${this.blacklisted.size} blacklisted proxies from ${snapshot.timestamp}.`
        );
        return true;
    }

    private async refreshLocked(): Promise<boolean> {
        log.info('[ProxyPool] Running proxy harvester to refresh the pool...');

        let fresh: ProxyRecord[];
        try {
            fresh = await this.harvester.harvest();
        } catch (err) {
            log.error(`[ProxyPool] Harvest failed: ${errorMessage(err)}`);
            return false;
        }

        const seen = new Set<string>();
        const unique: ProxyRecord[] = [];
        for (const p of fresh) {
            if (seen.has(p.address)) continue;
            seen.add(p.address);
            unique.push(p);
        }
        if (unique.length === 0) {
            log.warning('[ProxyPool] Harvest produced no working proxies.');
            return false;
        }

        this.working = unique.map((p) => ({ ...p }));
        this.cursor = 0;
        this.harvestedAt = new Date(this.now()).toISOString();
        for (const address of seen) this.blacklisted.delete(address);

        log.info(`[ProxyPool] Pool refreshed with ${this.working.length} proxies.`);
        await this.persistLocked();
        return true;
    }

    private toSnapshot(): PoolSnapshot {
        const timestamp = new Date(this.now()).toISOString();
        return {
            version: 1,
            timestamp,
            harvestedAt: this.harvestedAt ?? timestamp,
            working_proxies: this.working.map((p) => ({ ...p })),
            blacklisted_proxies: [...this.blacklisted.values()].map((p) => ({ ...p })),
        };
    }

    /** Persistence failures are logged; the pool carries on in memory. */
    private async persistLocked(): Promise<void> {
        const snapshot = this.toSnapshot();
        try {
            await this.store.save(snapshot);
            this.lastPersistedAt = snapshot.timestamp;
        } catch (err) {
            log.error(`[ProxyPool] Failed to persist pool state: ${errorMessage(err)}`);
        }
    }
}
