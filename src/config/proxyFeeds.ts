/**
 * src/config/proxyFeeds.ts
 *
 * Public proxy feeds harvested on every pool refresh.
 *
 * The three HTML tables share one layout (IP, Port, Code, Country,
 * Anonymity, Google, Https, Last Checked). The JSON and text feeds use
 * their own adapters; see src/sources/.
 */

import type { ProxyFeed } from '../sources/types.js';

export const DEFAULT_PROXY_FEEDS: ProxyFeed[] = [
    {
        name: 'free-proxy-list',
        kind: 'html-table',
        url: 'https://free-proxy-list.net/',
    },
    {
        name: 'us-proxy',
        kind: 'html-table',
        url: 'https://www.us-proxy.org/',
    },
    {
        name: 'sslproxies',
        kind: 'html-table',
        url: 'https://www.sslproxies.org/',
    },
    {
        name: 'geonode',
        kind: 'json',
        url: 'https://proxylist.geonode.com/api/proxy-list?limit=100&page=1&sort_by=lastChecked&sort_type=desc&protocols=http,https',
    },
    {
        name: 'proxyscrape-v3',
        kind: 'text',
        url: 'https://api.proxyscrape.com/v3/free-proxy-list/get?request=displayproxies&protocol=http&timeout=5000&country=all&ssl=all&anonymity=elite,anonymous&limit=100',
        maxCandidates: 100,
    },
];
