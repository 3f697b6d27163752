#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { readEnvOverrides, type ServiceConfig } from './config.js';
import { createConfigurationError } from './errors.js';
import { createIngestService } from './index.js';
import type { JobOptions } from './types.js';
import { reportIngestError } from './util/errorHandler.js';
import { flushProgress, logError, writeProgress, writeSummary } from './util/output.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const DEFAULT_POLL_MS = 250;

interface CrawlCommandOptions {
  strategy?: string;
  url?: string[];
  maxDepth?: string;
  maxConcurrent?: string;
  maxPages?: string;
  codeExamples?: boolean;
  heartbeatMs?: string;
  pollMs?: string;
  logLevel?: string;
}

const program = new Command();

program
  .name('ingest')
  .description('Crawl a URL into the in-memory knowledge store and report progress.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl')
  .description('Run one ingestion job and poll its progress until it finishes.')
  .argument('<url>', 'URL to ingest.')
  .option('--strategy <strategy>', 'single | batch | recursive | sitemap | auto (default: auto)')
  .option('--url <url...>', 'Additional URLs for the batch strategy.')
  .option('--max-depth <number>', 'Link hops to follow for recursive crawls. (default: 2)')
  .option('--max-concurrent <number>', 'Maximum concurrent requests. (default: 8)')
  .option('--max-pages <number>', 'Optional cap on pages fetched by recursive crawls.')
  .option('--no-code-examples', 'Skip code example extraction.')
  .option('--heartbeat-ms <number>', 'Heartbeat interval in milliseconds. (default: 30000)')
  .option('--poll-ms <number>', 'Progress polling interval in milliseconds. (default: 250)')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal).')
  .action(async (url: string, options: CrawlCommandOptions) => {
    try {
      await runCrawl(url, options);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function runCrawl(url: string, options: CrawlCommandOptions): Promise<void> {
  const config = buildServiceConfig(options);
  const service = createIngestService(config);
  const jobOptions = buildJobOptions(url, options);
  const pollMs = options.pollMs !== undefined ? asNumber(options.pollMs, 'poll-ms') : DEFAULT_POLL_MS;
  const startedAt = Date.now();

  const { jobId, alreadyRunning } = await service.start(url, options.strategy ?? 'auto', jobOptions);
  if (alreadyRunning) {
    logError(`Job ${jobId} is already running.`);
    return;
  }

  const onSigint = (): void => {
    service.cancel(jobId, 'interrupted');
  };
  process.once('SIGINT', onSigint);

  const render = (): void => {
    const snapshot = service.getProgress(jobId);
    if (snapshot) {
      writeProgress(snapshot);
    }
  };
  const poller = setInterval(render, pollMs);

  try {
    const outcome = await service.waitFor(jobId);
    render();
    if (!outcome) {
      throw createConfigurationError(`Job ${jobId} finished without an outcome.`, { jobId });
    }

    writeSummary(outcome, Date.now() - startedAt);
    if (outcome.state === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    clearInterval(poller);
    process.removeListener('SIGINT', onSigint);
    flushProgress();
  }
}

function buildServiceConfig(options: CrawlCommandOptions): ServiceConfig {
  const config: ServiceConfig = readEnvOverrides();

  if (options.maxConcurrent !== undefined) {
    config.maxConcurrent = asNumber(options.maxConcurrent, 'max-concurrent');
  }

  if (options.maxDepth !== undefined) {
    config.maxDepth = asNumber(options.maxDepth, 'max-depth');
  }

  if (options.heartbeatMs !== undefined) {
    config.heartbeatIntervalMs = asNumber(options.heartbeatMs, 'heartbeat-ms');
  }

  if (options.logLevel !== undefined) {
    config.logLevel = options.logLevel;
  }

  return config;
}

function buildJobOptions(url: string, options: CrawlCommandOptions): JobOptions {
  const jobOptions: JobOptions = {
    extractCodeExamples: options.codeExamples !== false,
  };

  if (options.url && options.url.length > 0) {
    jobOptions.urls = [url, ...options.url];
  }

  if (options.maxPages !== undefined) {
    jobOptions.maxPages = asNumber(options.maxPages, 'max-pages');
  }

  return jobOptions;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const ingestError = reportIngestError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${ingestError.message}`);
  process.exitCode = 1;
}
