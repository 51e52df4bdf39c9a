/**
 * src/browser/types.ts
 *
 * The browser-automation boundary. Any driver (Playwright, Puppeteer,
 * WebDriver, a test fake) plugs in by implementing BrowserDriver; the rest of
 * the engine never touches a browser API directly.
 */

import type { ProxySelection } from '../utils/proxyPool.js';

/**
 * `E` is the driver's own element handle type. Methods taking an element also
 * accept a CSS selector and resolve it first.
 */
export interface BrowserDriver<E = unknown> {
    /**
     * Loads `url`. Rejects with a NavigationTimeoutError when the budget runs
     * out, or with the driver's own error (ERR_PROXY_CONNECTION_FAILED etc.)
     * when the connection fails.
     */
    navigate(url: string, timeoutMs?: number): Promise<void>;
    findElement(selector: string): Promise<E | null>;
    findElements(selector: string): Promise<E[]>;
    click(target: E | string): Promise<boolean>;
    sendKeys(target: E | string, text: string): Promise<boolean>;
    /** Runs `script` as a function body in the page and resolves to its return value. */
    executeScript(script: string): Promise<unknown>;
    getText(target: E | string): Promise<string>;
    currentUrl(): Promise<string>;
    close(): Promise<void>;
}

/** Opens a driver routed through the given proxy, or with no proxy for the direct sentinel. */
export type BrowserDriverFactory = (selection: ProxySelection) => Promise<BrowserDriver>;
