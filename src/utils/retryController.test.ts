import { describe, expect, it, vi } from 'vitest';
import { NavigationTimeoutError } from './errors.js';
import { ErrorWindow } from './errorWindow.js';
import type { ProxySelection } from './proxyPool.js';
import { DIRECT_CONNECTION } from './proxyPool.js';
import { RetryController, backoffDelayMs, coolDownDelayMs } from './retryController.js';
import type { FailureReporter } from './retryController.js';
import { makeRecord } from './testRecords.js';

const MAPS_URL = 'https://www.google.com/maps/search/florists';
const proxy = makeRecord('10.0.0.1:8080');

function setup(maxRetries = 3) {
    const failures: ProxySelection[] = [];
    const sleeps: number[] = [];
    const pool: FailureReporter = {
        reportFailure: async (selection) => {
            failures.push(selection);
        },
    };
    const errorWindow = new ErrorWindow(60_000, () => 0);
    const controller = new RetryController(pool, {
        maxRetries,
        errorWindow,
        sleep: async (ms) => {
            sleeps.push(ms);
        },
    });
    return { controller, failures, sleeps, errorWindow };
}

describe('RetryController.handle', () => {
    it('rotates on a rate limit with exactly one failure report and no wait', async () => {
        const { controller, failures, sleeps } = setup();

        const action = await controller.handle({ kind: 'rate_limit', retryCount: 0, reason: 'HTTP 429' }, proxy);

        expect(action).toBe('rotate');
        expect(failures).toEqual([proxy]);
        expect(sleeps).toEqual([]);
    });

    it.each(['captcha', 'off_target', 'network_error'] as const)('rotates on %s', async (kind) => {
        const { controller, failures } = setup();
        await expect(controller.handle({ kind, retryCount: 0, reason: 'test' }, proxy)).resolves.toBe('rotate');
        expect(failures).toHaveLength(1);
    });

    it('backs off on a timeout while retries remain', async () => {
        const { controller, failures, sleeps } = setup();

        const action = await controller.handle({ kind: 'timeout', retryCount: 2, reason: 'slow' }, proxy);

        expect(action).toBe('backoff_retry');
        expect(sleeps).toEqual([4000]);
        expect(failures).toEqual([]);
    });

    it('aborts once the retry budget is spent', async () => {
        const { controller, failures, sleeps } = setup();

        const action = await controller.handle({ kind: 'timeout', retryCount: 3, reason: 'slow' }, DIRECT_CONNECTION);

        expect(action).toBe('abort');
        expect(failures).toEqual([DIRECT_CONNECTION]);
        expect(sleeps).toEqual([]);
    });
});

describe('RetryController.retryNavigation', () => {
    it('retries timeouts with exponential backoff, then aborts with a single report', async () => {
        const { controller, failures, sleeps, errorWindow } = setup();
        const navigate = vi.fn(async () => {
            throw new NavigationTimeoutError(MAPS_URL, 30_000);
        });

        const outcome = await controller.retryNavigation(MAPS_URL, proxy, navigate);

        expect(outcome).toEqual({
            ok: false,
            action: 'abort',
            signal: {
                kind: 'timeout',
                retryCount: 3,
                reason: `Navigation to ${MAPS_URL} timed out after 30000ms`,
            },
        });
        expect(navigate).toHaveBeenCalledTimes(4);
        expect(sleeps).toEqual([1000, 2000, 4000]);
        expect(failures).toEqual([proxy]);
        expect(errorWindow.count()).toBe(4);
    });

    it('succeeds after a transient timeout', async () => {
        const { controller, failures, sleeps } = setup();
        let calls = 0;

        const outcome = await controller.retryNavigation(MAPS_URL, proxy, async () => {
            calls++;
            if (calls === 1) throw new Error('Timeout 30000ms exceeded.');
        });

        expect(outcome).toEqual({ ok: true, retries: 1 });
        expect(sleeps).toEqual([1000]);
        expect(failures).toEqual([]);
    });

    it('rotates straight away on a connection failure', async () => {
        const { controller, failures, sleeps } = setup();

        const outcome = await controller.retryNavigation(MAPS_URL, proxy, async () => {
            throw new Error('net::ERR_TUNNEL_CONNECTION_FAILED');
        });

        expect(outcome).toMatchObject({ ok: false, action: 'rotate', signal: { kind: 'network_error' } });
        expect(failures).toEqual([proxy]);
        expect(sleeps).toEqual([]);
    });

    it('respects a smaller retry budget', async () => {
        const { controller, sleeps } = setup(1);

        const outcome = await controller.retryNavigation(MAPS_URL, proxy, async () => {
            throw new NavigationTimeoutError(MAPS_URL);
        });

        expect(outcome.ok).toBe(false);
        expect(sleeps).toEqual([1000]);
    });
});

describe('cool-down', () => {
    it('follows min(30, 5 * 2^(errors - 2)) seconds above two errors', () => {
        expect(coolDownDelayMs(0)).toBe(0);
        expect(coolDownDelayMs(2)).toBe(0);
        expect(coolDownDelayMs(3)).toBe(10_000);
        expect(coolDownDelayMs(4)).toBe(20_000);
        expect(coolDownDelayMs(5)).toBe(30_000);
        expect(coolDownDelayMs(12)).toBe(30_000);
    });

    it('sleeps for the computed delay', async () => {
        const { controller, sleeps } = setup();
        await expect(controller.coolDown(4)).resolves.toBe(20_000);
        expect(sleeps).toEqual([20_000]);
    });

    it('reads the error count from its window by default', async () => {
        const { controller, sleeps, errorWindow } = setup();
        await expect(controller.coolDown()).resolves.toBe(0);

        errorWindow.record();
        errorWindow.record();
        errorWindow.record();
        await expect(controller.coolDown()).resolves.toBe(10_000);
        expect(sleeps).toEqual([10_000]);
    });

    it('doubles the backoff per retry', () => {
        expect([0, 1, 2, 3].map((n) => backoffDelayMs(n))).toEqual([1000, 2000, 4000, 8000]);
    });
});
