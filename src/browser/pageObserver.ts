/**
 * src/browser/pageObserver.ts
 *
 * Reads the current page through a BrowserDriver and condenses it into the
 * ObservedPage the defense detector classifies.
 */

import { log } from 'crawlee';
import { NO_RESULTS_MARKERS } from '../config/defenseMarkers.js';
import type { ObservedPage } from '../utils/defenseDetector.js';
import { errorMessage } from '../utils/errors.js';
import type { BrowserDriver } from './types.js';

export interface PageExpectations {
    /** URL substring of the navigation whose HTTP status is read back (default "google.com/maps"). */
    targetPattern?: string;
    /** Results are expected on URLs containing this fragment (default "/search"). */
    resultsUrlFragment?: string;
    /** Selector of the results container (default the map listing feed). */
    resultsSelector?: string;
    noResultsMarkers?: readonly string[];
    /** Set by the caller when navigation already hit its time budget. */
    timedOut?: boolean;
}

export const DEFAULT_RESULTS_SELECTOR = "div[role='feed']";

export function navigationStatusScript(targetPattern: string): string {
    return [
        'const entries = window.performance.getEntries()',
        `    .filter((e) => e.name.includes(${JSON.stringify(targetPattern)}));`,
        'const last = entries[entries.length - 1];',
        "return last && typeof last.responseStatus === 'number' ? last.responseStatus : null;",
    ].join('\n');
}

/** Status of the last matching request, or null when the browser does not expose one. */
async function readNavigationStatus(driver: BrowserDriver, targetPattern: string): Promise<number | null> {
    try {
        const status = await driver.executeScript(navigationStatusScript(targetPattern));
        return typeof status === 'number' && status > 0 ? status : null;
    } catch (err) {
        log.debug(`[PageObserver] Navigation status unavailable: ${errorMessage(err)}`);
        return null;
    }
}

export async function observePage(
    driver: BrowserDriver,
    expectations: PageExpectations = {}
): Promise<ObservedPage> {
    const targetPattern = expectations.targetPattern ?? 'google.com/maps';
    const fragment = expectations.resultsUrlFragment ?? '/search';
    const markers = expectations.noResultsMarkers ?? NO_RESULTS_MARKERS;

    const url = await driver.currentUrl();
    const rawTitle = await driver.executeScript('return document.title;');
    const title = typeof rawTitle === 'string' ? rawTitle : '';
    const bodyText = await driver.getText('body');
    const statusCode = await readNavigationStatus(driver, targetPattern);

    const resultsExpected = url.includes(fragment);
    let resultsPresent = false;
    if (resultsExpected) {
        const containers = await driver.findElements(expectations.resultsSelector ?? DEFAULT_RESULTS_SELECTOR);
        resultsPresent = containers.length > 0;
    }

    const lowerBody = bodyText.toLowerCase();
    const noResultsMarker = markers.some((m) => lowerBody.includes(m));

    return {
        url,
        title,
        bodyText,
        statusCode,
        timedOut: expectations.timedOut ?? false,
        resultsExpected,
        resultsPresent,
        noResultsMarker,
    };
}
