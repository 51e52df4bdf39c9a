/**
 * src/sources/jsonFeed.ts
 *
 * Adapter for JSON proxy APIs (Geonode, ProxyScrape v3 JSON, and similar).
 *
 * Every provider names its fields differently, so each field is looked up
 * through an ordered list of plausible keys and the first usable value wins.
 * The entry list itself may be the document root or nested one level down.
 */

import { log } from 'crawlee';
import { createCandidate } from './types.js';
import type { JsonFeed, ProxyCandidate } from './types.js';

type JsonObject = Record<string, unknown>;

const LIST_KEYS = ['data', 'proxies', 'results', 'list', 'items'];

export const FIELD_KEYS = {
    host: ['ip', 'host', 'ip_address', 'ipAddress', 'addr', 'server'],
    port: ['port', 'proxy_port', 'portNumber'],
    country: ['country_code', 'countryCode', 'country', 'code', 'geo'],
    https: ['https', 'ssl', 'supportsHttps', 'protocols'],
    combined: ['proxy', 'address'],
} as const;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstValue(entry: JsonObject, keys: readonly string[]): unknown {
    for (const key of keys) {
        const value = entry[key];
        if (value !== undefined && value !== null && value !== '') return value;
    }
    return undefined;
}

function toText(value: unknown): string | undefined {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    return undefined;
}

/** Geonode nests the country as { code: "US" } on some endpoints. */
function toCountry(value: unknown): unknown {
    if (isObject(value)) return firstValue(value, ['code', 'iso', 'country_code']);
    return value;
}

function toHttpsFlag(value: unknown): boolean {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value === 1;
    if (typeof value === 'string') return ['yes', 'true', '1', 'https'].includes(value.trim().toLowerCase());
    if (Array.isArray(value)) {
        return value.some((p) => typeof p === 'string' && p.toLowerCase() === 'https');
    }
    return false;
}

function findEntries(doc: unknown): unknown[] | null {
    if (Array.isArray(doc)) return doc;
    if (!isObject(doc)) return null;
    for (const key of LIST_KEYS) {
        const nested = doc[key];
        if (Array.isArray(nested)) return nested;
    }
    return null;
}

function entryToCandidate(entry: unknown, feed: JsonFeed): ProxyCandidate | null {
    if (typeof entry === 'string') {
        const [host, port] = entry.trim().split(':');
        return host ? createCandidate({ host, port, source: feed.name }) : null;
    }
    if (!isObject(entry)) return null;

    let host = toText(firstValue(entry, FIELD_KEYS.host));
    let port: unknown = firstValue(entry, FIELD_KEYS.port);

    if (host === undefined || port === undefined) {
        const combined = toText(firstValue(entry, FIELD_KEYS.combined));
        const match = combined?.match(/^(?:[a-z0-9]+:\/\/)?([^:/\s]+):(\d{1,5})/i);
        if (match) {
            host = host ?? match[1];
            port = port ?? match[2];
        }
    }
    if (host === undefined) return null;

    return createCandidate({
        host,
        port,
        country: toCountry(firstValue(entry, FIELD_KEYS.country)),
        supportsHttps: toHttpsFlag(firstValue(entry, FIELD_KEYS.https)),
        source: feed.name,
    });
}

export function parseJsonFeed(body: string, feed: JsonFeed): ProxyCandidate[] {
    let doc: unknown;
    try {
        doc = JSON.parse(body);
    } catch {
        log.warning(`[${feed.name}] Response is not valid JSON.`);
        return [];
    }

    const entries = findEntries(doc);
    if (!entries) {
        log.warning(`[${feed.name}] No proxy list found in JSON response.`);
        return [];
    }

    const candidates: ProxyCandidate[] = [];
    for (const entry of entries) {
        const candidate = entryToCandidate(entry, feed);
        if (candidate) candidates.push(candidate);
    }
    return candidates;
}
