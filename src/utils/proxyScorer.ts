/**
 * src/utils/proxyScorer.ts
 *
 * Ranks tested proxies for the active pool.
 *
 * Score = latency points + anonymity points + TLS bonus, range [20, 100]:
 *
 *   latency     < 500ms → 50 · < 1s → 40 · < 2s → 30 · < 3s → 20 · else 10
 *   anonymity   elite → 30 · anonymous → 20 · transparent → 10
 *   https       supported → 20 · else 0
 *
 * Everything here is pure: same inputs, same ranking.
 */

import type { AnonymityClass, ProxyRecord } from './proxyValidator.js';

export type ScoreInput = Pick<ProxyRecord, 'latencyMs' | 'anonymity' | 'supportsHttps'>;

const ANONYMITY_POINTS: Record<AnonymityClass, number> = {
    elite: 30,
    anonymous: 20,
    transparent: 10,
};

function latencyPoints(latencyMs: number): number {
    if (latencyMs < 500) return 50;
    if (latencyMs < 1000) return 40;
    if (latencyMs < 2000) return 30;
    if (latencyMs < 3000) return 20;
    return 10;
}

export function scoreProxy(proxy: ScoreInput): number {
    return (
        latencyPoints(proxy.latencyMs) +
        ANONYMITY_POINTS[proxy.anonymity] +
        (proxy.supportsHttps ? 20 : 0)
    );
}

/**
 * Returns the best `count` records, highest score first; equal scores go to
 * the lower latency, then keep their input order. Inputs are not mutated:
 * each returned record is a copy carrying a freshly computed score.
 */
export function selectBest(records: readonly ProxyRecord[], count: number): ProxyRecord[] {
    const limit = Math.max(0, Math.floor(count));
    return records
        .map((record) => ({ ...record, score: scoreProxy(record) }))
        .sort((a, b) => b.score - a.score || a.latencyMs - b.latencyMs)
        .slice(0, limit);
}
