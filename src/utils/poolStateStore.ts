/**
 * src/utils/poolStateStore.ts
 *
 * Persistent proxy pool snapshot, kept across process restarts.
 *
 * STRUCTURE ON DISK:
 * {
 *   "version": 1,
 *   "timestamp":   "<ISO>",                        // last save
 *   "harvestedAt": "<ISO>",                        // when working_proxies was harvested
 *   "working_proxies":     [ ProxyRecord, ... ],   // rotation order
 *   "blacklisted_proxies": [ ProxyRecord, ... ]
 * }
 *
 * Every save replaces the whole file: the snapshot is written to a temp file
 * and renamed over the old one, so a crash mid-write leaves the previous
 * snapshot intact. A missing, unreadable or malformed file reads as null.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { log } from 'crawlee';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { ProxyRecord } from './proxyValidator.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PoolSnapshot {
    version: 1;
    timestamp: string;
    /** Freshness is measured from here, not from the last save. */
    harvestedAt: string;
    working_proxies: ProxyRecord[];
    blacklisted_proxies: ProxyRecord[];
}

export interface PoolStateStore {
    save(snapshot: PoolSnapshot): Promise<void>;
    /** The last saved snapshot, or null when none can be read. */
    load(): Promise<PoolSnapshot | null>;
}

// ─── Schema ───────────────────────────────────────────────────────────────────

const ProxyRecordSchema = z.object({
    address: z.string().min(3),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    supportsHttps: z.boolean(),
    source: z.string(),
    country: z.string().nullable(),
    reachable: z.literal(true),
    latencyMs: z.number().nonnegative(),
    returnedIp: z.string().nullable(),
    anonymity: z.enum(['elite', 'anonymous', 'transparent']),
    speed: z.enum(['fast', 'medium', 'slow']),
    score: z.number(),
    lastCheckedAt: z.string(),
});

const isoTimestamp = z.string().refine((t) => !Number.isNaN(Date.parse(t)), 'not an ISO timestamp');

const PoolSnapshotSchema = z.object({
    version: z.literal(1),
    timestamp: isoTimestamp,
    harvestedAt: isoTimestamp,
    working_proxies: z.array(ProxyRecordSchema),
    blacklisted_proxies: z.array(ProxyRecordSchema),
});

export function parseSnapshot(raw: unknown): PoolSnapshot | null {
    const parsed = PoolSnapshotSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

// ─── JSON File Store ──────────────────────────────────────────────────────────

export class JsonFilePoolStore implements PoolStateStore {
    constructor(readonly filePath: string) {}

    async save(snapshot: PoolSnapshot): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const tmp = `${this.filePath}.${process.pid}.tmp`;
        await fs.writeFile(tmp, JSON.stringify(snapshot, null, 2), 'utf-8');
        await fs.rename(tmp, this.filePath);
    }

    async load(): Promise<PoolSnapshot | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf-8');
        } catch (err) {
            log.debug(`[PoolStore] No snapshot at ${this.filePath}: ${errorMessage(err)}`);
            return null;
        }

        try {
            const snapshot = parseSnapshot(JSON.parse(raw));
            if (!snapshot) log.warning(`[PoolStore] Snapshot ${this.filePath} has an unexpected shape; ignoring it.`);
            return snapshot;
        } catch (err) {
            log.warning(`[PoolStore] Snapshot ${this.filePath} is corrupt; ignoring it. (${errorMessage(err)})`);
            return null;
        }
    }
}

// ─── In-Memory Store ──────────────────────────────────────────────────────────

/** Keeps the snapshot in process memory; used when persistence is disabled. */
export class MemoryPoolStore implements PoolStateStore {
    private snapshot: PoolSnapshot | null = null;
    saves = 0;

    async save(snapshot: PoolSnapshot): Promise<void> {
        this.snapshot = structuredClone(snapshot);
        this.saves++;
    }

    async load(): Promise<PoolSnapshot | null> {
        return this.snapshot ? structuredClone(this.snapshot) : null;
    }
}
