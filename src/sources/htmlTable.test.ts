import { describe, expect, it } from 'vitest';
import { parseHtmlTable } from './htmlTable.js';
import type { HtmlTableFeed } from './types.js';

const feed: HtmlTableFeed = { kind: 'html-table', name: 'table-feed', url: 'http://feed.test/' };

function row(cells: string[]): string {
    return `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`;
}

function page(rows: string[], tableAttrs = 'id="proxylisttable"'): string {
    return `<html><body>
        <table ${tableAttrs}>
            <thead><tr><th>IP Address</th><th>Port</th><th>Code</th><th>Country</th>
            <th>Anonymity</th><th>Google</th><th>Https</th><th>Last Checked</th></tr></thead>
            <tbody>${rows.join('')}</tbody>
        </table>
    </body></html>`;
}

describe('parseHtmlTable', () => {
    it('reads host, port, country and the https column by position', () => {
        const html = page([
            row(['10.0.0.1', '8080', 'US', 'United States', 'elite proxy', 'no', 'yes', '1 min ago']),
            row(['10.0.0.2', '3128', 'de', 'Germany', 'anonymous', 'no', 'no', '2 mins ago']),
        ]);

        expect(parseHtmlTable(html, feed)).toEqual([
            {
                address: '10.0.0.1:8080',
                host: '10.0.0.1',
                port: 8080,
                supportsHttps: true,
                source: 'table-feed',
                country: 'US',
            },
            {
                address: '10.0.0.2:3128',
                host: '10.0.0.2',
                port: 3128,
                supportsHttps: false,
                source: 'table-feed',
                country: 'DE',
            },
        ]);
    });

    it('drops rows with an unusable host or port', () => {
        const html = page([
            row(['not-an-ip!', '80', 'US', 'United States', 'elite proxy', 'no', 'no', 'now']),
            row(['10.0.0.3', '99999', 'US', 'United States', 'elite proxy', 'no', 'no', 'now']),
            row(['10.0.0.4', '80', 'United States', 'x', 'elite proxy', 'no', 'YES', 'now']),
        ]);

        const result = parseHtmlTable(html, feed);
        expect(result).toHaveLength(1);
        expect(result[0]).toMatchObject({ address: '10.0.0.4:80', country: null, supportsHttps: true });
    });

    it('falls back to any table when the known selectors miss', () => {
        const html = page(
            [row(['10.0.0.5', '80', 'FR', 'France', 'anonymous', 'no', 'no', 'now'])],
            'class="listing"'
        );
        expect(parseHtmlTable(html, feed).map((c) => c.address)).toEqual(['10.0.0.5:80']);
    });

    it('returns nothing when the page has no table', () => {
        expect(parseHtmlTable('<html><body><p>Maintenance</p></body></html>', feed)).toEqual([]);
    });

    it('skips rows shorter than the expected column count', () => {
        const html = page([row(['10.0.0.6', '80', 'US'])]);
        expect(parseHtmlTable(html, feed)).toEqual([]);
    });

    it('honours per-feed column overrides', () => {
        const custom: HtmlTableFeed = {
            ...feed,
            columns: { host: 1, port: 2, country: 0, https: 3, minColumns: 4 },
        };
        const html = page([row(['gb', '10.0.0.7', '1080', 'yes'])]);

        expect(parseHtmlTable(html, custom)).toEqual([
            {
                address: '10.0.0.7:1080',
                host: '10.0.0.7',
                port: 1080,
                supportsHttps: true,
                source: 'table-feed',
                country: 'GB',
            },
        ]);
    });
});
