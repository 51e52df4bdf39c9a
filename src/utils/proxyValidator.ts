import { log } from 'crawlee';
import { gotScraping } from 'got-scraping';
import { z } from 'zod';
import type { ProxyCandidate } from '../sources/types.js';
import { runWithConcurrency } from './batchRunner.js';
import { errorMessage } from './errors.js';
import { toProxyUrl } from './freeProxyFetcher.js';
import { scoreProxy } from './proxyScorer.js';
import { randomUserAgent } from './userAgents.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type AnonymityClass = 'elite' | 'anonymous' | 'transparent';
export type SpeedClass = 'fast' | 'medium' | 'slow';

export interface ProxyRecord extends ProxyCandidate {
    reachable: true;
    latencyMs: number;              // Measured during the trial request
    returnedIp: string | null;      // Address the echo endpoint saw, if parseable
    anonymity: AnonymityClass;
    speed: SpeedClass;
    score: number;                  // 20 to 100, see proxyScorer.ts
    lastCheckedAt: string;          // ISO timestamp of the trial request
}

export interface HttpTextResponse {
    statusCode: number;
    body: string;
}

export interface ProxyRequest {
    url: string;
    proxyUrl?: string;
    timeoutMs: number;
    userAgent: string;
}

/** Single-shot GET, optionally through a forward proxy. Rejects on any transport error. */
export type ProxyHttpClient = (request: ProxyRequest) => Promise<HttpTextResponse>;

/** A URL that answers with the caller's apparent IP, and how to read it. */
export interface EchoEndpoint {
    url: string;
    extractIp(body: string): string | null;
}

export interface ProxyTestOptions {
    /** Echo endpoints to pick from at random for each trial. */
    endpoints?: EchoEndpoint[];
    /** Per-request timeout in milliseconds (default 5000). */
    timeoutMs?: number;
    client?: ProxyHttpClient;
    /** Clock used for latency and lastCheckedAt; defaults to Date.now. */
    now?: () => number;
    random?: () => number;
}

export interface BatchTestOptions extends ProxyTestOptions {
    /** Number of concurrent trial requests (default 20). */
    concurrency?: number;
    /** Log progress every N completions (default 10). */
    progressEvery?: number;
}

// ─── Echo Endpoints ───────────────────────────────────────────────────────────

function jsonField(body: string, field: string): string | null {
    try {
        const parsed: unknown = JSON.parse(body);
        if (typeof parsed === 'object' && parsed !== null && field in parsed) {
            const value: unknown = Reflect.get(parsed, field);
            return typeof value === 'string' ? value.trim() : null;
        }
    } catch {
        return null; // captive portals answer with HTML
    }
    return null;
}

export const DEFAULT_ECHO_ENDPOINTS: EchoEndpoint[] = [
    { url: 'http://httpbin.org/ip', extractIp: (body) => jsonField(body, 'origin') },
    { url: 'http://icanhazip.com', extractIp: (body) => body.trim() || null },
    { url: 'https://api.myip.com', extractIp: (body) => jsonField(body, 'ip') },
];

// ─── HTTP Client ──────────────────────────────────────────────────────────────

export const gotScrapingClient: ProxyHttpClient = async ({ url, proxyUrl, timeoutMs, userAgent }) => {
    const response = await gotScraping({
        url,
        proxyUrl,
        responseType: 'text',
        headers: { 'user-agent': userAgent },
        timeout: { request: timeoutMs },
        retry: { limit: 0 },
        throwHttpErrors: false,
    });
    return {
        statusCode: response.statusCode,
        body: typeof response.body === 'string' ? response.body : String(response.body),
    };
};

// ─── Classification ───────────────────────────────────────────────────────────

const ipAddress = z.string().ip();

/**
 * Compares the address an echo endpoint reported against the proxy's own.
 *
 *   no IPv4 or IPv6 address         → elite       (origin hidden)
 *   only the proxy's own address    → anonymous   (proxy visible, origin hidden)
 *   anything else                   → transparent (another address leaked)
 */
export function classifyAnonymity(returnedIp: string | null, proxyHost: string): AnonymityClass {
    const reported = (returnedIp ?? '')
        .split(',')
        .map((ip) => ip.trim())
        .filter((ip) => ipAddress.safeParse(ip).success);

    if (reported.length === 0) return 'elite';
    if (reported.every((ip) => ip === proxyHost)) return 'anonymous';
    return 'transparent';
}

export function classifySpeed(latencyMs: number): SpeedClass {
    if (latencyMs < 1000) return 'fast';
    if (latencyMs < 3000) return 'medium';
    return 'slow';
}

// ─── Core Validator ───────────────────────────────────────────────────────────

/**
 * Tests a single candidate and returns a ProxyRecord if it passes,
 * or null if it is dead, misbehaving or too slow to answer in time.
 *
 * One trial is definitive: there is no retry here. Transient failures are
 * the pool manager's concern once the proxy is in rotation.
 */
export async function testProxy(
    candidate: ProxyCandidate,
    options: ProxyTestOptions = {}
): Promise<ProxyRecord | null> {
    const {
        endpoints = DEFAULT_ECHO_ENDPOINTS,
        timeoutMs = 5000,
        client = gotScrapingClient,
        now = Date.now,
        random = Math.random,
    } = options;

    if (endpoints.length === 0) {
        throw new Error('testProxy needs at least one echo endpoint');
    }

    const endpoint = endpoints[Math.floor(random() * endpoints.length)];
    const proxyUrl = toProxyUrl(candidate);
    const start = now();
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
        const response = await Promise.race([
            client({ url: endpoint.url, proxyUrl, timeoutMs, userAgent: randomUserAgent(random) }),
            new Promise<never>((_, reject) => {
                timer = setTimeout(() => reject(new Error('Hard timeout')), timeoutMs + 1000);
            }),
        ]);
        const latencyMs = Math.max(0, now() - start);

        if (response.statusCode !== 200) {
            log.debug(`[Validator] ${candidate.address} answered HTTP ${response.statusCode}`);
            return null;
        }

        const returnedIp = endpoint.extractIp(response.body);
        const record: ProxyRecord = {
            ...candidate,
            reachable: true,
            latencyMs,
            returnedIp,
            anonymity: classifyAnonymity(returnedIp, candidate.host),
            speed: classifySpeed(latencyMs),
            score: 0,
            lastCheckedAt: new Date(now()).toISOString(),
        };
        record.score = scoreProxy(record);
        return record;
    } catch (err) {
        // Connection refused, proxy tunnel failure, ETIMEDOUT …
        log.debug(`[Validator] Proxy ${candidate.address} failed: ${errorMessage(err)}`);
        return null;
    } finally {
        if (timer !== undefined) clearTimeout(timer);
    }
}

// ─── Batch Validator ──────────────────────────────────────────────────────────

/**
 * Tests candidates with a fixed-size worker pool. Output order follows
 * completion, not input; only the set of passing records matters.
 */
export async function testProxies(
    candidates: ProxyCandidate[],
    options: BatchTestOptions = {}
): Promise<ProxyRecord[]> {
    const { concurrency = 20, progressEvery = 10, ...testOptions } = options;
    const total = candidates.length;

    log.info(`Testing ${total} proxies (${concurrency} concurrent workers)...`);

    const results: ProxyRecord[] = [];
    let tested = 0;

    await runWithConcurrency(candidates, concurrency, async (candidate) => {
        const record = await testProxy(candidate, testOptions);
        tested++;
        if (record) results.push(record);
        if (tested % progressEvery === 0 || tested === total) {
            log.info(`[Validator] Tested ${tested}/${total} proxies, ${results.length} alive so far.`);
        }
    });

    log.info(
        `Validation complete. ${results.length}/${total} proxies passed` +
        (total > 0 ? ` (${Math.round((results.length / total) * 100)}% success rate).` : '.')
    );

    return results;
}

// ─── Public IP ────────────────────────────────────────────────────────────────

/** Asks the first echo endpoint for this machine's own address, without a proxy. */
export async function detectPublicIp(
    client: ProxyHttpClient = gotScrapingClient,
    endpoint: EchoEndpoint = DEFAULT_ECHO_ENDPOINTS[0]
): Promise<string | null> {
    try {
        const response = await client({ url: endpoint.url, timeoutMs: 5000, userAgent: randomUserAgent() });
        return response.statusCode === 200 ? endpoint.extractIp(response.body) : null;
    } catch (err) {
        log.warning(`Could not detect public IP: ${errorMessage(err)}`);
        return null;
    }
}
