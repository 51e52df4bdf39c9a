/**
 * src/sources/htmlTable.ts
 *
 * Adapter for HTML proxy tables (free-proxy-list.net, us-proxy.org,
 * sslproxies.org and their clones).
 *
 * Parsing is column-positional: IP, Port, Code, Country, Anonymity, Google,
 * Https, Last Checked. When the page layout drifts (no table, no body rows,
 * too few cells) the feed yields nothing instead of throwing.
 */

import { log } from 'crawlee';
import * as cheerio from 'cheerio';
import { createCandidate } from './types.js';
import type { HtmlTableColumns, HtmlTableFeed, ProxyCandidate } from './types.js';

export const DEFAULT_TABLE_COLUMNS: HtmlTableColumns = {
    host: 0,
    port: 1,
    country: 2,
    https: 6,
    minColumns: 8,
};

const TABLE_SELECTORS = ['table#proxylisttable', 'table.table'];

export function parseHtmlTable(html: string, feed: HtmlTableFeed): ProxyCandidate[] {
    const columns: HtmlTableColumns = { ...DEFAULT_TABLE_COLUMNS, ...feed.columns };
    const $ = cheerio.load(html);

    const table = [...TABLE_SELECTORS, 'table']
        .map((selector) => $(selector).first())
        .find((match) => match.length > 0);

    if (!table) {
        log.warning(`[${feed.name}] No proxy table found on page.`);
        return [];
    }

    // Prefer tbody rows; some mirrors render the table without a tbody.
    let rows = table.find('tbody tr');
    if (rows.length === 0) rows = table.find('tr');

    const candidates: ProxyCandidate[] = [];
    let shortRows = 0;

    rows.each((_, row) => {
        const cells = $(row).find('td');
        if (cells.length < columns.minColumns) {
            shortRows++;
            return;
        }

        const cell = (index: number): string => cells.eq(index).text().trim();
        const candidate = createCandidate({
            host: cell(columns.host),
            port: cell(columns.port),
            country: cell(columns.country),
            supportsHttps: cell(columns.https).toLowerCase() === 'yes',
            source: feed.name,
        });
        if (candidate) candidates.push(candidate);
    });

    if (candidates.length === 0 && shortRows > 0) {
        log.warning(
            `[${feed.name}] Table layout changed: ${shortRows} rows had fewer than ${columns.minColumns} columns.`
        );
    }

    return candidates;
}
