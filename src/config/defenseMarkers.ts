/**
 * src/config/defenseMarkers.ts
 *
 * Text fingerprints of block and challenge pages on the map-search target.
 * All lowercase; compare against lowercased title/body text, or the
 * lowercased URL for the URL markers.
 */

export const CAPTCHA_MARKERS: string[] = [
    'captcha',                          // reCAPTCHA / hCaptcha widgets and copy
    'recaptcha',
    'unusual traffic',                  // Google "sorry" interstitial
    'suspicious activity',
    'not a robot',
    'verify you are human',
];

/** Path fragments of challenge pages the target redirects to. */
export const CAPTCHA_URL_MARKERS: string[] = [
    '/sorry/',                          // google.com/sorry/index?continue=...
];

export const RATE_LIMIT_MARKERS: string[] = [
    'rate limit',
    'too many requests',
    'temporarily blocked',
    'access denied',
];

/** HTTP statuses bot-detection systems answer with instead of the page. */
export const BLOCK_STATUS_CODES: readonly number[] = [429, 403, 503];

export const NO_RESULTS_MARKERS: string[] = [
    'no results found',
    "can't find",
];
