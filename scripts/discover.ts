#!/usr/bin/env tsx

/**
 * CLI for contact discovery
 * Usage:
 *   npm run discover <urls-file> [options]
 *   npm run discover -- --urls=https://a.example,https://b.example [options]
 *
 * Options:
 *   --force-browser            Skip the cheap fetch and always render
 *   --max-concurrent <n>       Concurrent cheap fetches (default 10)
 *   --retry <n>                Cheap fetch attempts per URL (default 2)
 *   --rate-limit <seconds>     Delay before each fetch (default 0.5)
 *   --browser-pool <n>         Browser sessions (default 3)
 *   --proxies <file>           Proxy list, one per line (or PROXIES_FILE)
 *   --min-confidence <0..1>    Minimum confidence for the CSV
 *   --escalate-on-exhaustion   Render in the browser when cheap retries run out
 *   --no-subpages              Only fetch the homepage of each site
 *   --headed                   Show the browser window
 *   --output <dir>             Output directory (default ./output)
 *   --log-level <level>        quiet | normal | verbose | debug (or LOG_LEVEL)
 */

import { readFile } from 'fs/promises';
import { createDiscoveryEngine } from '../src/engines/discovery-engine.js';
import { buildProxyRotator, resolveJobConfig } from '../src/drivers/job-config.js';
import { writeJobOutput } from '../src/drivers/output.js';
import { parseArgs } from '../src/utils/cli-args.js';
import { errorMessage, installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { logger, parseLogLevel, formatTime } from '../src/utils/logger.js';
import type { JobConfigInput } from '../src/types/job.js';

// Install global error handlers to prevent crashes from browser disconnections
installGlobalErrorHandlers();

const log = logger.createContext('discover-cli');

async function readUrls(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

async function main(): Promise<void> {
  const { input: urlsFile, options } = parseArgs(process.argv.slice(2));
  logger.setLevel(parseLogLevel(options.logLevel ?? process.env.LOG_LEVEL));

  const urls = [...(urlsFile ? await readUrls(urlsFile) : []), ...(options.urls ?? [])];
  if (urls.length === 0) {
    log.error('No URLs given. Usage: npm run discover <urls-file> [options]');
    process.exit(1);
  }

  const jobOptions: JobConfigInput = {
    maxConcurrent: options.maxConcurrent,
    retryAttempts: options.retryAttempts,
    rateLimitDelaySeconds: options.rateLimitDelaySeconds,
    browserPoolSize: options.browserPoolSize,
    forceBrowser: options.forceBrowser,
    minConfidenceScore: options.minConfidenceScore,
    escalateOnCheapExhaustion: options.escalateOnExhaustion,
    headless: options.headed ? false : undefined,
    subpages: options.noSubpages ? [] : undefined
  };

  const config = resolveJobConfig(jobOptions);
  const rotator = await buildProxyRotator(config, options.proxiesFile);
  const engine = createDiscoveryEngine(config, rotator);

  const job = await engine.run(urls);
  const written = await writeJobOutput(job, options.output ?? 'output');

  const { summary } = job;
  console.log(`\nProcessed ${summary.total} site(s) in ${formatTime(summary.elapsedMs)}`);
  console.log(`  HTTP: ${summary.httpSuccess}, Browser: ${summary.browserSuccess}, Failed: ${summary.failed}, Skipped: ${summary.skipped}`);
  console.log(`  Retries: ${summary.retries}, Escalations: ${summary.escalations}`);
  console.log(`  Accepted rows: ${job.results.filter(result => result.meetsConfidence).length} -> ${written.csv}`);
  for (const failure of summary.failedUrls) {
    console.log(`  ✗ ${failure.url}: ${failure.reason}`);
  }
}

main().catch((error: unknown) => {
  log.error(`Discovery failed: ${errorMessage(error)}`);
  process.exit(1);
});
