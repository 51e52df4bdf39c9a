import type { BrowserDriver } from './types.js';

export interface ScriptedPage {
    url: string;
    title?: string;
    body?: string;
    status?: number | null;
    /** Selectors that match one element on this page. */
    selectors?: string[];
}

export type PageScript = (url: string, attempt: number) => ScriptedPage | Error;

/** In-memory BrowserDriver for unit tests; element handles are the selectors themselves. */
export class ScriptedDriver implements BrowserDriver<string> {
    readonly visits: string[] = [];
    closed = false;
    private page: ScriptedPage = { url: 'about:blank' };

    constructor(private readonly script: PageScript) {}

    async navigate(url: string): Promise<void> {
        this.visits.push(url);
        const result = this.script(url, this.visits.length);
        if (result instanceof Error) throw result;
        this.page = result;
    }

    async findElement(selector: string): Promise<string | null> {
        return this.page.selectors?.includes(selector) ? selector : null;
    }

    async findElements(selector: string): Promise<string[]> {
        return this.page.selectors?.includes(selector) ? [selector] : [];
    }

    async click(target: string): Promise<boolean> {
        return this.page.selectors?.includes(target) ?? false;
    }

    async sendKeys(target: string): Promise<boolean> {
        return this.page.selectors?.includes(target) ?? false;
    }

    async executeScript(script: string): Promise<unknown> {
        if (script.includes('document.title')) return this.page.title ?? '';
        if (script.includes('performance.getEntries')) return this.page.status ?? null;
        return undefined;
    }

    async getText(target: string): Promise<string> {
        return target === 'body' ? this.page.body ?? '' : '';
    }

    async currentUrl(): Promise<string> {
        return this.page.url;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
