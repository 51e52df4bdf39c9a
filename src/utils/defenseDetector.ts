/**
 * src/utils/defenseDetector.ts
 *
 * Classifies what the target site did to the last request.
 *
 * Checks run in a fixed order and the first match wins:
 *
 *   1. CAPTCHA marker in title/body or URL     → captcha
 *   2. block text or HTTP 429/403/503          → rate_limit
 *   3. landed outside the target URL pattern   → off_target
 *   4. navigation exceeded its time budget     → timeout
 *   5. results expected, container missing,
 *      and no explicit "no results" marker     → rate_limit
 *
 * Rule 5 counts an empty results pane as a block unless the page says
 * outright that the search has no results.
 */

import {
    BLOCK_STATUS_CODES,
    CAPTCHA_MARKERS,
    CAPTCHA_URL_MARKERS,
    NO_RESULTS_MARKERS,
    RATE_LIMIT_MARKERS,
} from '../config/defenseMarkers.js';
import { NavigationTimeoutError, errorMessage } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type DefenseKind = 'captcha' | 'rate_limit' | 'timeout' | 'network_error' | 'off_target';

export interface DefenseSignal {
    kind: DefenseKind;
    /** Retries already spent on the current URL. */
    retryCount: number;
    /** Short human-readable cause, for logs. */
    reason: string;
}

/** What a page looked like after navigation, as gathered by the observer. */
export interface ObservedPage {
    url?: string | null;
    title?: string;
    bodyText?: string;
    statusCode?: number | null;
    timedOut?: boolean;
    resultsExpected?: boolean;
    resultsPresent?: boolean;
    noResultsMarker?: boolean;
}

export interface DefenseRules {
    /** Substring every on-target URL contains, e.g. "google.com/maps". */
    targetPattern: string;
    captchaMarkers: readonly string[];
    /** Matched against the page URL rather than its text. */
    captchaUrlMarkers: readonly string[];
    rateLimitMarkers: readonly string[];
    blockStatusCodes: readonly number[];
    noResultsMarkers: readonly string[];
}

export const DEFAULT_DEFENSE_RULES: DefenseRules = {
    targetPattern: 'google.com/maps',
    captchaMarkers: CAPTCHA_MARKERS,
    captchaUrlMarkers: CAPTCHA_URL_MARKERS,
    rateLimitMarkers: RATE_LIMIT_MARKERS,
    blockStatusCodes: BLOCK_STATUS_CODES,
    noResultsMarkers: NO_RESULTS_MARKERS,
};

// Connection-level failures from Chromium's net stack; all of them point at the proxy.
const NETWORK_ERROR_CODES = [
    'ERR_TUNNEL_CONNECTION_FAILED',
    'ERR_PROXY_CONNECTION_FAILED',
    'ERR_CONNECTION_REFUSED',
    'ERR_CONNECTION_TIMED_OUT',
    'ERR_CONNECTION_CLOSED',
    'ERR_CONNECTION_RESET',
    'ERR_INTERNET_DISCONNECTED',
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
];

// ─── Helpers ──────────────────────────────────────────────────────────────────

function findMarker(text: string, markers: readonly string[]): string | undefined {
    return markers.find((marker) => text.includes(marker));
}

// ─── Classification ───────────────────────────────────────────────────────────

export function classifyDefense(
    page: ObservedPage,
    rules: Partial<DefenseRules> = {},
    retryCount = 0
): DefenseSignal | null {
    const r: DefenseRules = { ...DEFAULT_DEFENSE_RULES, ...rules };
    const text = `${page.title ?? ''}\n${page.bodyText ?? ''}`.toLowerCase();
    const signal = (kind: DefenseKind, reason: string): DefenseSignal => ({ kind, retryCount, reason });

    const captcha = findMarker(text, r.captchaMarkers);
    if (captcha) return signal('captcha', `marker "${captcha}"`);
    const captchaUrl = findMarker((page.url ?? '').toLowerCase(), r.captchaUrlMarkers);
    if (captchaUrl) return signal('captcha', `URL marker "${captchaUrl}"`);

    const block = findMarker(text, r.rateLimitMarkers);
    if (block) return signal('rate_limit', `marker "${block}"`);
    if (page.statusCode != null && r.blockStatusCodes.includes(page.statusCode)) {
        return signal('rate_limit', `HTTP ${page.statusCode}`);
    }

    if (page.url && !page.url.includes(r.targetPattern)) {
        return signal('off_target', `landed on ${page.url}`);
    }

    if (page.timedOut) return signal('timeout', 'navigation timed out');

    if (page.resultsExpected && !page.resultsPresent) {
        const noResults = page.noResultsMarker || findMarker(text, r.noResultsMarkers) !== undefined;
        if (!noResults) return signal('rate_limit', 'results container missing');
    }

    return null;
}

/** Maps an error thrown by a driver's navigate() onto a defense signal. */
export function classifyNavigationError(err: unknown, retryCount = 0): DefenseSignal {
    const message = errorMessage(err);

    const code = NETWORK_ERROR_CODES.find((c) => message.includes(c));
    if (code) return { kind: 'network_error', retryCount, reason: code };

    const lower = message.toLowerCase();
    if (err instanceof NavigationTimeoutError || lower.includes('timeout') || lower.includes('timed out')) {
        return { kind: 'timeout', retryCount, reason: message.slice(0, 200) };
    }

    return { kind: 'network_error', retryCount, reason: message.slice(0, 200) };
}
