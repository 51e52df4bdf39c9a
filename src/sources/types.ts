/**
 * src/sources/types.ts
 *
 * Shared types for every proxy feed adapter.
 *
 * Every adapter turns one raw payload (HTML page, JSON document, text list)
 * into ProxyCandidate objects. Candidates are only ever built through
 * createCandidate(), so downstream code never re-checks host or port.
 */

import { z } from 'zod';

// ─── Proxy Candidate ──────────────────────────────────────────────────────────

export interface ProxyCandidate {
    address: string;             // "host:port", the identity of the proxy
    host: string;
    port: number;
    supportsHttps: boolean;      // Feed claims the proxy tunnels TLS
    source: string;              // Feed name the candidate came from
    country: string | null;      // ISO-3166 alpha-2, upper case, when the feed knows it
}

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;
const HOSTNAME = /^(?=.{1,253}$)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*$/i;

const CandidateInputSchema = z.object({
    host: z
        .string()
        .trim()
        .refine((h) => IPV4.test(h) || (HOSTNAME.test(h) && /[a-z]/i.test(h)), 'not an IPv4 address or hostname'),
    port: z.preprocess(
        (v) => (typeof v === 'string' ? Number(v.trim()) : v),
        z.number().int().min(1).max(65535)
    ),
    supportsHttps: z.boolean().default(false),
    source: z.string().min(1),
    country: z.unknown().transform((v): string | null => {
        if (typeof v !== 'string') return null;
        const code = v.trim().toUpperCase();
        return /^[A-Z]{2}$/.test(code) ? code : null;
    }),
});

export type CandidateInput = z.input<typeof CandidateInputSchema>;

/**
 * Validates a loosely-shaped feed entry and returns a candidate, or null when
 * the host or port is unusable. An unrecognisable country is dropped rather
 * than rejecting the whole entry.
 */
export function createCandidate(input: CandidateInput): ProxyCandidate | null {
    const parsed = CandidateInputSchema.safeParse(input);
    if (!parsed.success) return null;

    const { host, port, supportsHttps, source, country } = parsed.data;
    return {
        address: `${host}:${port}`,
        host,
        port,
        supportsHttps,
        source,
        country,
    };
}

// ─── Feed Definitions ─────────────────────────────────────────────────────────

export interface HtmlTableColumns {
    host: number;
    port: number;
    country: number;
    https: number;
    /** Rows with fewer cells than this are skipped. */
    minColumns: number;
}

interface FeedBase {
    name: string;
    url: string;
    /** Upper bound on candidates taken from this feed per harvest. */
    maxCandidates?: number;
}

export interface HtmlTableFeed extends FeedBase {
    kind: 'html-table';
    columns?: Partial<HtmlTableColumns>;
}

export interface JsonFeed extends FeedBase {
    kind: 'json';
}

export interface TextFeed extends FeedBase {
    kind: 'text';
    /** Value used when the list does not say whether a proxy tunnels TLS. */
    assumeHttps?: boolean;
}

export type ProxyFeed = HtmlTableFeed | JsonFeed | TextFeed;

/** Fetches the raw body of a feed. Rejects on network or HTTP failure. */
export type FeedFetcher = (feed: ProxyFeed) => Promise<string>;
