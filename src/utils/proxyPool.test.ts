import { describe, expect, it } from 'vitest';
import { PoolExhaustedError } from './errors.js';
import { MemoryPoolStore } from './poolStateStore.js';
import type { PoolSnapshot, PoolStateStore } from './poolStateStore.js';
import { DIRECT_CONNECTION, ProxyPool, isDirect } from './proxyPool.js';
import type { Harvester, ProxySelection } from './proxyPool.js';
import type { ProxyRecord } from './proxyValidator.js';
import { makeRecord } from './testRecords.js';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;

class FakeHarvester implements Harvester {
    calls = 0;

    constructor(private readonly batches: ProxyRecord[][]) {}

    async harvest(): Promise<ProxyRecord[]> {
        const batch = this.batches[this.calls] ?? [];
        this.calls++;
        return batch;
    }
}

class FailingStore implements PoolStateStore {
    async save(_snapshot: PoolSnapshot): Promise<void> {
        throw new Error('EACCES: permission denied');
    }

    async load(): Promise<PoolSnapshot | null> {
        return null;
    }
}

/** Accepts the first save, then fails like a read-only disk. */
class StoreFailingAfterFirstSave extends MemoryPoolStore {
    async save(snapshot: PoolSnapshot): Promise<void> {
        if (this.saves > 0) throw new Error('EROFS: read-only file system');
        await super.save(snapshot);
    }
}

function records(...addresses: string[]): ProxyRecord[] {
    return addresses.map((a) => makeRecord(a));
}

function label(selection: ProxySelection | null): string {
    if (selection === null) return 'none';
    return isDirect(selection) ? 'direct' : selection.address;
}

async function take(pool: ProxyPool, n: number): Promise<string[]> {
    const out: string[] = [];
    for (let i = 0; i < n; i++) out.push(label(await pool.nextProxy()));
    return out;
}

describe('ProxyPool rotation', () => {
    it('harvests on first use and rotates round-robin', async () => {
        const harvester = new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80')]);
        const pool = new ProxyPool(new MemoryPoolStore(), harvester, { now: () => NOW });

        expect(await take(pool, 4)).toEqual(['10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80', '10.0.0.1:80']);
        expect(harvester.calls).toBe(1);
    });

    it('restores from the snapshot before harvesting', async () => {
        const store = new MemoryPoolStore();
        await store.save({
            version: 1,
            timestamp: new Date(NOW - HOUR).toISOString(),
            harvestedAt: new Date(NOW - HOUR).toISOString(),
            working_proxies: records('10.0.0.7:80'),
            blacklisted_proxies: [],
        });
        const harvester = new FakeHarvester([records('10.0.0.1:80')]);
        const pool = new ProxyPool(store, harvester, { now: () => NOW });

        expect(await take(pool, 2)).toEqual(['10.0.0.7:80', '10.0.0.7:80']);
        expect(harvester.calls).toBe(0);
    });

    it('never hands out the same slot to concurrent callers', async () => {
        const addresses = ['10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80', '10.0.0.4:80', '10.0.0.5:80'];
        const pool = new ProxyPool(new MemoryPoolStore(), new FakeHarvester([records(...addresses)]));

        const selections = await Promise.all(addresses.map(() => pool.nextProxy()));
        expect(new Set(selections.map(label))).toEqual(new Set(addresses));
    });
});

describe('ProxyPool failure handling', () => {
    it('switches to the direct connection after three consecutive failures', async () => {
        const store = new MemoryPoolStore();
        const harvester = new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80', '10.0.0.4:80')]);
        const pool = new ProxyPool(store, harvester, { maxFailures: 3, allowDirect: true, now: () => NOW });

        for (let i = 0; i < 3; i++) {
            const selection = await pool.nextProxy();
            if (selection === null) throw new Error('expected a selection');
            await pool.reportFailure(selection);
        }

        expect(await pool.nextProxy()).toBe(DIRECT_CONNECTION);

        const status = await pool.getStatus();
        expect(status.working).toEqual(['10.0.0.4:80']);
        expect(status.blacklisted).toEqual(['10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80']);
        expect(status.consecutiveFailures).toBe(3);
        expect(store.saves).toBe(4);
    });

    it('goes back to proxies after a success', async () => {
        const pool = new ProxyPool(
            new MemoryPoolStore(),
            new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80')]),
            { maxFailures: 1 }
        );

        const first = await pool.nextProxy();
        if (first === null) throw new Error('expected a selection');
        await pool.reportFailure(first);
        expect(label(await pool.nextProxy())).toBe('direct');

        await pool.reportSuccess(DIRECT_CONNECTION);
        expect(label(await pool.nextProxy())).toBe('10.0.0.2:80');
    });

    it('keeps the cursor on the next record when an earlier one is removed', async () => {
        const pool = new ProxyPool(
            new MemoryPoolStore(),
            new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80')])
        );

        const [first] = await Promise.all([pool.nextProxy(), pool.nextProxy()]);
        if (first === null) throw new Error('expected a selection');
        await pool.reportFailure(first);

        expect(await take(pool, 2)).toEqual(['10.0.0.3:80', '10.0.0.2:80']);
    });

    it('counts direct-connection failures without touching the lists', async () => {
        const pool = new ProxyPool(new MemoryPoolStore(), new FakeHarvester([records('10.0.0.1:80')]));
        await pool.refresh();

        await pool.reportFailure(DIRECT_CONNECTION);
        await pool.reportFailure(makeRecord('10.0.0.99:80'));

        const status = await pool.getStatus();
        expect(status.consecutiveFailures).toBe(2);
        expect(status.working).toEqual(['10.0.0.1:80']);
        expect(status.blacklisted).toEqual([]);
    });

    it('keeps working in memory when the snapshot cannot be written', async () => {
        const pool = new ProxyPool(new FailingStore(), new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80')]));

        await expect(pool.refresh()).resolves.toBe(true);
        await pool.reportFailure(makeRecord('10.0.0.1:80'));

        const status = await pool.getStatus();
        expect(status.working).toEqual(['10.0.0.2:80']);
        expect(status.lastPersistedAt).toBeNull();
    });

    it('does not bring blacklisted proxies back from an older snapshot', async () => {
        const harvester = new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80')]);
        const pool = new ProxyPool(new StoreFailingAfterFirstSave(), harvester, {
            allowDirect: false,
            now: () => NOW,
        });
        await pool.refresh();
        await pool.reportFailure(makeRecord('10.0.0.1:80'));
        await pool.reportFailure(makeRecord('10.0.0.2:80'));

        await expect(pool.nextProxy()).resolves.toBeNull();
        expect(harvester.calls).toBe(2);
        await expect(pool.load()).resolves.toBe(false);

        const status = await pool.getStatus();
        expect(status.working).toEqual([]);
        expect(status.blacklisted).toEqual(['10.0.0.1:80', '10.0.0.2:80']);
    });
});

describe('ProxyPool refresh', () => {
    it('keeps working and blacklisted addresses disjoint when a blacklisted proxy is re-admitted', async () => {
        const harvester = new FakeHarvester([
            records('10.0.0.1:80', '10.0.0.2:80', '10.0.0.3:80'),
            records('10.0.0.1:80', '10.0.0.5:80'),
        ]);
        const pool = new ProxyPool(new MemoryPoolStore(), harvester);
        await pool.refresh();
        await pool.reportFailure(makeRecord('10.0.0.1:80'));
        await pool.reportFailure(makeRecord('10.0.0.2:80'));

        await expect(pool.refresh()).resolves.toBe(true);

        const status = await pool.getStatus();
        expect(status.working).toEqual(['10.0.0.1:80', '10.0.0.5:80']);
        expect(status.blacklisted).toEqual(['10.0.0.2:80']);
        expect(status.cursor).toBe(0);
    });

    it('leaves the pool alone when the harvest comes back empty', async () => {
        const pool = new ProxyPool(new MemoryPoolStore(), new FakeHarvester([records('10.0.0.1:80'), []]));
        await pool.refresh();

        await expect(pool.refresh()).resolves.toBe(false);
        expect((await pool.getStatus()).working).toEqual(['10.0.0.1:80']);
    });

    it('reports a throwing harvester as a failed refresh', async () => {
        const harvester: Harvester = {
            harvest: async () => {
                throw new Error('all feeds down');
            },
        };
        const pool = new ProxyPool(new MemoryPoolStore(), harvester);
        await expect(pool.refresh()).resolves.toBe(false);
    });

    it('drops duplicate addresses from a harvest', async () => {
        const pool = new ProxyPool(
            new MemoryPoolStore(),
            new FakeHarvester([records('10.0.0.1:80', '10.0.0.1:80', '10.0.0.2:80')])
        );
        await pool.refresh();
        expect((await pool.getStatus()).working).toEqual(['10.0.0.1:80', '10.0.0.2:80']);
    });
});

describe('ProxyPool persistence', () => {
    it('restores exactly what a refresh persisted', async () => {
        const store = new MemoryPoolStore();
        const first = new ProxyPool(store, new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80')]), {
            now: () => NOW,
        });
        await first.refresh();
        await first.reportFailure(makeRecord('10.0.0.2:80'));

        const second = new ProxyPool(store, new FakeHarvester([]), { now: () => NOW + HOUR });
        await expect(second.load()).resolves.toBe(true);

        expect(await second.getWorking()).toEqual(await first.getWorking());
        const status = await second.getStatus();
        expect(status.blacklisted).toEqual(['10.0.0.2:80']);
        expect(status.lastPersistedAt).toBe('2026-03-01T12:00:00.000Z');
    });

    it('ignores a snapshot older than the freshness window', async () => {
        const store = new MemoryPoolStore();
        await new ProxyPool(store, new FakeHarvester([records('10.0.0.1:80')]), { now: () => NOW }).refresh();

        const later = new ProxyPool(store, new FakeHarvester([]), { now: () => NOW + 25 * HOUR });
        await expect(later.load()).resolves.toBe(false);
    });

    it('measures freshness from the harvest, not from the last blacklist write', async () => {
        const store = new MemoryPoolStore();
        let clock = NOW;
        const first = new ProxyPool(store, new FakeHarvester([records('10.0.0.1:80', '10.0.0.2:80')]), {
            now: () => clock,
        });
        await first.refresh();
        clock = NOW + 47 * HOUR;
        await first.reportFailure(makeRecord('10.0.0.1:80'));

        const saved = await store.load();
        expect(saved?.timestamp).toBe(new Date(NOW + 47 * HOUR).toISOString());
        expect(saved?.harvestedAt).toBe(new Date(NOW).toISOString());

        const later = new ProxyPool(store, new FakeHarvester([]), { now: () => NOW + 48 * HOUR });
        await expect(later.load()).resolves.toBe(false);
    });

    it('ignores a snapshot with no working proxies', async () => {
        const store = new MemoryPoolStore();
        await store.save({
            version: 1,
            timestamp: new Date(NOW).toISOString(),
            harvestedAt: new Date(NOW).toISOString(),
            working_proxies: [],
            blacklisted_proxies: records('10.0.0.1:80'),
        });
        const pool = new ProxyPool(store, new FakeHarvester([]), { now: () => NOW });
        await expect(pool.load()).resolves.toBe(false);
    });
});

describe('ProxyPool exhaustion', () => {
    it('returns null when nothing is usable and direct connections are disabled', async () => {
        const pool = new ProxyPool(new MemoryPoolStore(), new FakeHarvester([]), { allowDirect: false });

        await expect(pool.nextProxy()).resolves.toBeNull();
        await expect(pool.acquire()).rejects.toBeInstanceOf(PoolExhaustedError);
    });

    it('falls back to the direct connection when allowed', async () => {
        const pool = new ProxyPool(new MemoryPoolStore(), new FakeHarvester([]), { allowDirect: true });
        await expect(pool.acquire()).resolves.toBe(DIRECT_CONNECTION);
    });
});
