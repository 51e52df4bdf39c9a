import { log } from 'crawlee';
import { gotScraping } from 'got-scraping';
import { parseHtmlTable } from '../sources/htmlTable.js';
import { parseJsonFeed } from '../sources/jsonFeed.js';
import { parsePlainText } from '../sources/plainText.js';
import type { FeedFetcher, ProxyCandidate, ProxyFeed } from '../sources/types.js';
import { errorMessage } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface FetchCandidatesOptions {
    /** Raw body fetcher; defaults to got-scraping. */
    fetcher?: FeedFetcher;
    /** Cap applied to feeds that do not set their own maxCandidates. */
    maxPerSource?: number;
    /** Two-letter country code to keep, or 'ALL' to keep everything. */
    countryFilter?: string;
}

const DEFAULT_MAX_PER_SOURCE = 200;

// ─── Raw Fetch ────────────────────────────────────────────────────────────────

export const fetchFeedBody: FeedFetcher = async (feed) => {
    const response = await gotScraping({
        url: feed.url,
        responseType: 'text',
        timeout: { request: 10_000 },
        retry: { limit: 1 },
    });
    if (response.statusCode !== 200) {
        throw new Error(`HTTP ${response.statusCode}`);
    }
    return typeof response.body === 'string' ? response.body : String(response.body);
};

// ─── Per-Feed Parsing ─────────────────────────────────────────────────────────

/**
 * Dispatches a raw body to the adapter for the feed's shape.
 * A new feed shape gets a new adapter and a new case here.
 */
export function parseFeed(body: string, feed: ProxyFeed): ProxyCandidate[] {
    switch (feed.kind) {
        case 'html-table':
            return parseHtmlTable(body, feed);
        case 'json':
            return parseJsonFeed(body, feed);
        case 'text':
            return parsePlainText(body, feed);
    }
}

/**
 * Fetches and parses one feed. Never throws: a broken feed contributes zero
 * candidates and the harvest carries on with the others.
 */
export async function fetchCandidates(
    feed: ProxyFeed,
    options: FetchCandidatesOptions = {}
): Promise<ProxyCandidate[]> {
    const { fetcher = fetchFeedBody, maxPerSource = DEFAULT_MAX_PER_SOURCE } = options;
    const limit = feed.maxCandidates ?? maxPerSource;

    try {
        const body = await fetcher(feed);
        const parsed = parseFeed(body, feed);
        const capped = parsed.slice(0, limit);

        log.info(
            `[${feed.name}] Fetched ${parsed.length} raw proxies` +
            (parsed.length > capped.length ? ` (capped to ${capped.length}).` : '.')
        );
        return capped;
    } catch (err) {
        log.warning(`[${feed.name}] Fetch failed: ${errorMessage(err)}`);
        return [];
    }
}

// ─── Public Entry Point ────────────────────────────────────────────────────────

/**
 * Aggregates candidates from every configured feed in parallel, applies the
 * country filter and deduplicates by "host:port" (first occurrence wins, in
 * feed order).
 */
export async function fetchAllCandidates(
    feeds: ProxyFeed[],
    options: FetchCandidatesOptions = {}
): Promise<ProxyCandidate[]> {
    log.info(`Fetching proxy lists from ${feeds.length} sources in parallel...`);

    const settled = await Promise.allSettled(feeds.map((feed) => fetchCandidates(feed, options)));
    const all = settled.flatMap((r) => (r.status === 'fulfilled' ? r.value : []));

    const country = (options.countryFilter ?? 'ALL').toUpperCase();
    const filtered = country === 'ALL' ? all : all.filter((c) => c.country === country);
    if (filtered.length < all.length) {
        log.info(`Country filter ${country} kept ${filtered.length}/${all.length} proxies.`);
    }

    const seen = new Set<string>();
    const unique = filtered.filter((c) => {
        if (seen.has(c.address)) return false;
        seen.add(c.address);
        return true;
    });

    log.info(`Proxy fetch complete. ${unique.length} unique candidates across all sources.`);
    return unique;
}

/**
 * Converts a candidate into the URL form HTTP clients and browsers expect.
 * e.g.  { host: '1.2.3.4', port: 8080 }  →  'http://1.2.3.4:8080'
 */
export function toProxyUrl(proxy: Pick<ProxyCandidate, 'host' | 'port'>): string {
    return `http://${proxy.host}:${proxy.port}`;
}
