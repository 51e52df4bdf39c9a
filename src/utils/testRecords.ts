import type { ProxyRecord } from './proxyValidator.js';

/** Builds a tested proxy record for unit tests. */
export function makeRecord(
    address: string,
    overrides: Partial<Omit<ProxyRecord, 'address' | 'host' | 'port'>> = {}
): ProxyRecord {
    const [host = '', port = '0'] = address.split(':');
    return {
        address,
        host,
        port: Number(port),
        supportsHttps: true,
        source: 'test-feed',
        country: 'US',
        reachable: true,
        latencyMs: 250,
        returnedIp: null,
        anonymity: 'elite',
        speed: 'fast',
        score: 100,
        lastCheckedAt: '2026-01-01T00:00:00.000Z',
        ...overrides,
    };
}
