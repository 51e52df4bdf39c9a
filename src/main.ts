#!/usr/bin/env node
/**
 * src/main.ts
 *
 * proxy-pool CLI
 *
 *   harvest            fetch, test and rank proxies; replace the pool
 *   status             show the persisted pool
 *   next               take the next selection from the pool
 *   check <host:port>  test one proxy against the echo endpoints
 *
 * Exit code 1 on an exhausted pool, a failed harvest or a dead proxy.
 */

import 'dotenv/config';
import { createRequire } from 'node:module';
import chalk from 'chalk';
import { Command } from 'commander';
import { log } from 'crawlee';
import { z } from 'zod';
import { createEngine } from './bootstrap.js';
import { env } from './config/env.js';
import { createCandidate } from './sources/types.js';
import { PoolExhaustedError, errorMessage } from './utils/errors.js';
import { isDirect } from './utils/proxyPool.js';
import type { PoolStatus } from './utils/proxyPool.js';
import { detectPublicIp, testProxy } from './utils/proxyValidator.js';
import type { ProxyRecord, SpeedClass } from './utils/proxyValidator.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

// ─── Output ───────────────────────────────────────────────────────────────────

const SPEED_COLOR: Record<SpeedClass, (text: string) => string> = {
    fast: chalk.green,
    medium: chalk.yellow,
    slow: chalk.red,
};

function printRecords(records: ProxyRecord[]): void {
    if (records.length === 0) {
        console.log(chalk.dim('  (no working proxies)'));
        return;
    }
    console.log(
        chalk.bold(
            `  ${'ADDRESS'.padEnd(22)}${'CC'.padEnd(4)}${'ANONYMITY'.padEnd(12)}` +
            `${'SPEED'.padEnd(8)}${'LATENCY'.padStart(8)}${'SCORE'.padStart(7)}  SOURCE`
        )
    );
    for (const r of records) {
        console.log(
            `  ${r.address.padEnd(22)}${(r.country ?? '--').padEnd(4)}${r.anonymity.padEnd(12)}` +
            `${SPEED_COLOR[r.speed](r.speed.padEnd(8))}${`${r.latencyMs}ms`.padStart(8)}` +
            `${String(r.score).padStart(7)}  ${chalk.dim(r.source)}`
        );
    }
}

function printStatus(status: PoolStatus): void {
    console.log(chalk.cyan('\nProxy pool'));
    console.log(`  working       ${chalk.green(String(status.working.length))}`);
    console.log(`  blacklisted   ${chalk.red(String(status.blacklisted.length))}`);
    console.log(`  failures      ${status.consecutiveFailures}/${status.maxFailures}`);
    console.log(`  direct        ${status.allowDirect ? 'allowed' : 'disabled'}`);
    console.log(`  harvested at  ${status.harvestedAt ?? chalk.dim('never')}`);
    console.log(`  persisted at  ${status.lastPersistedAt ?? chalk.dim('never')}\n`);
}

// ─── Commands ─────────────────────────────────────────────────────────────────

async function runHarvest(): Promise<void> {
    const { pool } = createEngine(env);
    const refreshed = await pool.refresh();
    printStatus(await pool.getStatus());
    printRecords(await pool.getWorking());
    if (!refreshed) process.exitCode = 1;
}

async function runStatus(): Promise<void> {
    const { pool } = createEngine(env);
    const loaded = await pool.load();
    if (!loaded) {
        console.log(chalk.yellow('No fresh pool snapshot found. Run `proxy-pool harvest` first.'));
    }
    printStatus(await pool.getStatus());
    printRecords(await pool.getWorking());
}

async function runNext(): Promise<void> {
    const { pool } = createEngine(env);
    const selection = await pool.acquire();
    console.log(isDirect(selection) ? chalk.yellow('direct connection') : selection.address);
}

async function runCheck(address: string): Promise<void> {
    const [host = '', port = ''] = address.split(':');
    const candidate = createCandidate({ host, port, source: 'cli', country: null, supportsHttps: false });
    if (!candidate) {
        console.error(chalk.red(`Not a host:port pair: ${address}`));
        process.exitCode = 1;
        return;
    }

    const publicIp = await detectPublicIp();
    console.log(chalk.dim(`Public IP without proxy: ${publicIp ?? 'unknown'}`));

    const record = await testProxy(candidate, { timeoutMs: env.PROXY_TEST_TIMEOUT_MS });
    if (!record) {
        console.log(chalk.red(`✖ ${candidate.address} is not usable.`));
        process.exitCode = 1;
        return;
    }
    console.log(chalk.green(`✔ ${candidate.address} answered as ${record.returnedIp ?? 'an unreadable address'}.`));
    printRecords([record]);
}

// ─── Entry ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('proxy-pool')
        .description('Harvest, test and rotate free proxies for map-search scraping')
        .version(pkg.version)
        .option('-v, --verbose', 'Log at debug level')
        .hook('preAction', () => {
            const { verbose } = program.opts<{ verbose?: boolean }>();
            log.setLevel(verbose ? log.LEVELS.DEBUG : log.LEVELS[env.LOG_LEVEL]);
        });

    program
        .command('harvest')
        .description('Fetch, test and rank proxies, then replace the pool')
        .action(() => runHarvest());

    program
        .command('status')
        .description('Show the persisted pool')
        .action(() => runStatus());

    program
        .command('next')
        .description('Take the next proxy selection from the pool')
        .action(() => runNext());

    program
        .command('check')
        .argument('<address>', 'Proxy as host:port')
        .description('Test a single proxy')
        .action((address: string) => runCheck(address));

    await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
    if (err instanceof PoolExhaustedError) {
        console.error(chalk.red(err.message));
    } else {
        console.error(chalk.red(`CLI failed: ${errorMessage(err)}`));
    }
    process.exit(1);
});
