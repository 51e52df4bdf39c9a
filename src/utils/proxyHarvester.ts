/**
 * src/utils/proxyHarvester.ts
 *
 * One harvest cycle: fetch candidates from every feed, test them, keep the
 * best N. This is the collaborator ProxyPool.refresh() calls.
 */

import { log } from 'crawlee';
import type { FeedFetcher, ProxyFeed } from '../sources/types.js';
import { fetchAllCandidates } from './freeProxyFetcher.js';
import type { Harvester } from './proxyPool.js';
import { selectBest } from './proxyScorer.js';
import { testProxies } from './proxyValidator.js';
import type { BatchTestOptions, ProxyRecord } from './proxyValidator.js';

export interface HarvesterOptions {
    feeds: ProxyFeed[];
    /** How many proxies the pool should hold after a harvest. */
    poolSize: number;
    maxPerSource?: number;
    countryFilter?: string;
    fetcher?: FeedFetcher;
    test?: BatchTestOptions;
}

export class ProxyHarvester implements Harvester {
    constructor(private readonly options: HarvesterOptions) {}

    async harvest(): Promise<ProxyRecord[]> {
        const { feeds, poolSize, maxPerSource, countryFilter, fetcher, test } = this.options;
        log.info('Initialising proxy harvest...');

        const candidates = await fetchAllCandidates(feeds, { fetcher, maxPerSource, countryFilter });
        if (candidates.length === 0) {
            log.error('Proxy harvest failed: no candidates found in any source.');
            return [];
        }

        const working = await testProxies(candidates, test);
        if (working.length === 0) {
            log.warning('Proxy harvest finished with no working proxies.');
            return [];
        }

        const best = selectBest(working, poolSize);
        if (best.length === 0) return [];

        const fastest = best[0];
        log.info(
            `Proxy harvest complete: keeping ${best.length}/${working.length} working proxies. ` +
            `Best: ${fastest.address} (${fastest.country ?? '??'}) score ${fastest.score}, ${fastest.latencyMs}ms.`
        );
        return best;
    }
}
