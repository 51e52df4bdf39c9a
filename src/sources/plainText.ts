/**
 * src/sources/plainText.ts
 *
 * Adapter for line-oriented proxy lists ("ip:port" per line, optionally
 * followed by annotations such as "US-H-S +" on spys-style lists).
 */

import { createCandidate } from './types.js';
import type { ProxyCandidate, TextFeed } from './types.js';

const ADDRESS = /\b(\d{1,3}(?:\.\d{1,3}){3}):(\d{1,5})\b/;
const COUNTRY_TOKEN = /(?:^|[\s,;|(\[])([A-Z]{2})(?=$|[\s,;|)\]-])/;
const HTTPS_HINT = /\bhttps\b|-S\b/i;
const COMMENT_PREFIXES = ['#', '//', ';'];

export function parsePlainText(body: string, feed: TextFeed): ProxyCandidate[] {
    const candidates: ProxyCandidate[] = [];

    for (const rawLine of body.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix))) continue;

        const match = ADDRESS.exec(line);
        if (!match) continue;

        const rest = line.slice(match.index + match[0].length);
        const country = COUNTRY_TOKEN.exec(rest)?.[1] ?? null;

        const candidate = createCandidate({
            host: match[1],
            port: match[2],
            country,
            supportsHttps: HTTPS_HINT.test(rest) || (feed.assumeHttps ?? false),
            source: feed.name,
        });
        if (candidate) candidates.push(candidate);
    }

    return candidates;
}
