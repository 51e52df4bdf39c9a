/**
 * src/bootstrap.ts
 *
 * Wires the configured pieces together: feeds → harvester → pool, the
 * retry controller next to it, and sessions on top.
 */

import { log } from 'crawlee';
import type { BrowserDriverFactory } from './browser/types.js';
import type { Env } from './config/envSchema.js';
import { DEFAULT_PROXY_FEEDS } from './config/proxyFeeds.js';
import { ProxiedSession } from './session.js';
import type { FeedFetcher, ProxyFeed } from './sources/types.js';
import { ErrorWindow } from './utils/errorWindow.js';
import { JsonFilePoolStore, MemoryPoolStore } from './utils/poolStateStore.js';
import type { PoolStateStore } from './utils/poolStateStore.js';
import { ProxyHarvester } from './utils/proxyHarvester.js';
import { ProxyPool } from './utils/proxyPool.js';
import type { ProxyHttpClient } from './utils/proxyValidator.js';
import { RetryController } from './utils/retryController.js';

export type EngineConfig = Pick<
    Env,
    | 'PROXY_STATE_PATH'
    | 'PROXY_POOL_SIZE'
    | 'PROXY_TEST_TIMEOUT_MS'
    | 'PROXY_TEST_CONCURRENCY'
    | 'PROXY_MAX_PER_SOURCE'
    | 'PROXY_COUNTRY'
    | 'PROXY_MAX_FAILURES'
    | 'PROXY_ALLOW_DIRECT'
    | 'PROXY_STATE_MAX_AGE_HOURS'
    | 'MAX_TIMEOUT_RETRIES'
    | 'ERROR_WINDOW_MS'
    | 'TARGET_URL_PATTERN'
    | 'LISTINGS_PER_PROXY'
>;

/** Test seams; production runs use the defaults. */
export interface EngineOverrides {
    feeds?: ProxyFeed[];
    fetcher?: FeedFetcher;
    client?: ProxyHttpClient;
    store?: PoolStateStore;
}

export interface Engine {
    pool: ProxyPool;
    harvester: ProxyHarvester;
    controller: RetryController;
    store: PoolStateStore;
    /** Opens a scrape-loop session on this pool; drivers come from `driverFactory`. */
    createSession(driverFactory: BrowserDriverFactory): ProxiedSession;
}

export function createStore(statePath: string): PoolStateStore {
    if (statePath.trim() === '') {
        log.info('[Bootstrap] PROXY_STATE_PATH is empty; pool state will not survive restarts.');
        return new MemoryPoolStore();
    }
    return new JsonFilePoolStore(statePath);
}

export function createEngine(config: EngineConfig, overrides: EngineOverrides = {}): Engine {
    const store = overrides.store ?? createStore(config.PROXY_STATE_PATH);

    const harvester = new ProxyHarvester({
        feeds: overrides.feeds ?? DEFAULT_PROXY_FEEDS,
        poolSize: config.PROXY_POOL_SIZE,
        maxPerSource: config.PROXY_MAX_PER_SOURCE,
        countryFilter: config.PROXY_COUNTRY,
        fetcher: overrides.fetcher,
        test: {
            timeoutMs: config.PROXY_TEST_TIMEOUT_MS,
            concurrency: config.PROXY_TEST_CONCURRENCY,
            client: overrides.client,
        },
    });

    const pool = new ProxyPool(store, harvester, {
        maxFailures: config.PROXY_MAX_FAILURES,
        allowDirect: config.PROXY_ALLOW_DIRECT,
        maxSnapshotAgeMs: config.PROXY_STATE_MAX_AGE_HOURS * 60 * 60 * 1000,
    });

    const controller = new RetryController(pool, {
        maxRetries: config.MAX_TIMEOUT_RETRIES,
        errorWindow: new ErrorWindow(config.ERROR_WINDOW_MS),
    });

    const createSession = (driverFactory: BrowserDriverFactory): ProxiedSession =>
        new ProxiedSession({
            pool,
            driverFactory,
            controller,
            rules: { targetPattern: config.TARGET_URL_PATTERN },
            listingsPerProxy: config.LISTINGS_PER_PROXY,
        });

    return { pool, harvester, controller, store, createSession };
}
