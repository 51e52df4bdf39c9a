import { describe, expect, it } from 'vitest';
import { createEngine, createStore } from './bootstrap.js';
import { ScriptedDriver } from './browser/testDriver.js';
import { parseEnv } from './config/envSchema.js';
import { JsonFilePoolStore, MemoryPoolStore } from './utils/poolStateStore.js';
import { isDirect } from './utils/proxyPool.js';
import type { ProxyHttpClient } from './utils/proxyValidator.js';

describe('createStore', () => {
    it('keeps state in memory when no path is configured', () => {
        expect(createStore('')).toBeInstanceOf(MemoryPoolStore);
        expect(createStore('storage/pool.json')).toBeInstanceOf(JsonFilePoolStore);
    });
});

describe('createEngine', () => {
    it('wires feeds, tester and pool from configuration', async () => {
        const client: ProxyHttpClient = async ({ proxyUrl }) => {
            if (proxyUrl === 'http://10.0.0.2:80') throw new Error('ECONNREFUSED');
            return { statusCode: 200, body: '{"origin": ""}' };
        };
        const { pool } = createEngine(parseEnv({ PROXY_STATE_PATH: '', PROXY_MAX_FAILURES: '1' }), {
            feeds: [{ kind: 'text', name: 'local', url: 'http://local.test/list.txt' }],
            fetcher: async () => '10.0.0.1:80\n10.0.0.2:80\n10.0.0.3:80',
            client,
        });

        const first = await pool.acquire();
        expect(isDirect(first) ? 'direct' : first.address).toMatch(/^10\.0\.0\.[13]:80$/);

        await pool.reportFailure(first);
        expect(isDirect(await pool.acquire())).toBe(true);

        const status = await pool.getStatus();
        expect(status.working).toHaveLength(1);
        expect(status.maxFailures).toBe(1);
    });
});

describe('Engine.createSession', () => {
    it('applies the configured target pattern and listing quota', async () => {
        const engine = createEngine(
            parseEnv({ PROXY_STATE_PATH: '', TARGET_URL_PATTERN: 'maps.example.test', LISTINGS_PER_PROXY: '1' }),
            { feeds: [], fetcher: async () => '' }
        );
        const session = engine.createSession(async () =>
            new ScriptedDriver(() => ({ url: 'https://maps.example.test/place/1', title: 'Place' }))
        );

        const result = await session.visit('https://maps.example.test/place/1');
        expect(result.ok).toBe(true);
        await expect(session.noteListing()).resolves.toBe(true);
    });
});
