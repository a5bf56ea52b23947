import { logger, formatTime, formatRate, formatProgress } from '../utils/logger.js';
import { buildSubpageUrl, normalizeUrl } from '../core/utils/url-utils.js';
import { cleanEmails, scoreConfidence } from '../core/contacts.js';
import { mergeFieldBags } from '../core/merge.js';
import { VerificationTracker } from '../services/verification-tracker.js';
import { BrowserPool } from '../services/browser-pool.js';
import { HttpRenderer } from '../drivers/http.js';
import { PlaywrightRenderer, createLocalSession } from '../drivers/browser.js';
import { HtmlExtractor } from '../drivers/extractor.js';
import { FetchOrchestrator } from './fetch-orchestrator.js';
import { DATA_SOURCES } from '../types/field-bag.js';
import type { FetchOrchestratorDeps } from './fetch-orchestrator.js';
import type { ProxyRotator } from '../services/proxy-rotator.js';
import type { FieldBag } from '../types/field-bag.js';
import type { PoolableSession, Session } from '../types/session.js';
import type { FetchResult, TerminalOutcome } from '../types/fetch.js';
import type { JobConfig, JobResult, JobSummary, PageResult, ScrapeMethod, SiteResult } from '../types/job.js';

const log = logger.createContext('discovery');

interface SiteRun {
  result: SiteResult;
  tracker: VerificationTracker;
  report: string;
}

/**
 * Runs a batch of sites. Each site gets its own verification record: the
 * homepage goes first, the guessed sub-pages follow when it was fetched, and
 * the record is finalized and reported once the site's pages are merged.
 *
 * Sites run concurrently; the orchestrator's semaphore and the browser pool
 * bound the actual network work. There is no job-level cancellation.
 */
export class DiscoveryEngine<S extends PoolableSession> {
  private readonly orchestrator: FetchOrchestrator<S>;
  private readonly config: JobConfig;

  constructor(private readonly deps: FetchOrchestratorDeps<S>) {
    this.config = deps.config;
    this.orchestrator = new FetchOrchestrator(deps);
  }

  async run(batch: readonly string[]): Promise<JobResult> {
    const startedAt = new Date();
    this.deps.rotator.reset();
    this.orchestrator.resetStats();

    const urls = uniqueUrls(batch);
    if (urls.length < batch.length) {
      log.normal(`Ignoring ${batch.length - urls.length} duplicate URL(s)`);
    }

    log.normal(`Starting discovery for ${urls.length} site(s), ${this.config.maxConcurrent} concurrent, browser pool ${this.deps.pool.capacity}`);

    let done = 0;
    let runs: SiteRun[];
    try {
      runs = await Promise.all(urls.map(async url => {
        const run = await this.runSite(url);
        done++;
        log.verbose(`Progress ${formatProgress(done, urls.length)}`);
        return run;
      }));
    } finally {
      await this.deps.pool.drain();
    }

    const finishedAt = new Date();
    const summary = this.summarize(runs, startedAt, finishedAt);

    logger.separator();
    log.quiet(
      `Done: ${summary.httpSuccess} http, ${summary.browserSuccess} browser, ${summary.failed} failed, ` +
      `${summary.skipped} skipped in ${formatTime(summary.elapsedMs)} (${formatRate(summary.total, summary.elapsedMs)})`
    );

    return {
      results: runs.map(run => run.result),
      verification: runs.map(run => run.tracker.toJSON()),
      reports: new Map(runs.map(run => [run.result.url, run.report])),
      summary
    };
  }

  private async runSite(url: string): Promise<SiteRun> {
    const tracker = new VerificationTracker(url);
    const startedAt = new Date();

    const home = await this.orchestrator.fetch(url, { tracker, pageName: 'homepage' });
    const pages: PageResult[] = [toPageResult('homepage', home)];

    if (isSuccess(home.outcome)) {
      const targets = this.config.subpages.map(name => ({ name, url: buildSubpageUrl(url, name) }));
      tracker.markInternalLinksChecked(targets.map(target => target.url));

      const subpages = await Promise.all(targets.map(async target => {
        const result = await this.orchestrator.fetch(target.url, { tracker, pageName: target.name });
        return toPageResult(target.name, result);
      }));
      pages.push(...subpages);
    }

    const bags = pages.flatMap(page => isSuccess(page.outcome) ? [page.outcome.fields] : []);
    let fields: FieldBag | undefined;

    if (bags.length > 0) {
      fields = mergeFieldBags(bags);
      recordDataSources(tracker, fields);
      fields.emails = cleanEmails(fields.emails);
    }

    if (fields && fields.emails.length > 0) {
      tracker.addEmails(fields.emails);
      tracker.markEmailsCleaned();
    } else {
      tracker.setNoEmailReason(noEmailReason(home.outcome, bags.length));
    }

    tracker.finalize();
    const report = tracker.report();

    const confidence = fields ? scoreConfidence(fields) : 0;
    const result: SiteResult = {
      url,
      outcome: home.outcome,
      method: methodOf(home.outcome),
      fields,
      confidence,
      meetsConfidence: fields !== undefined && confidence >= this.config.minConfidenceScore,
      pages,
      startedAt,
      finishedAt: new Date()
    };

    log.verbose(`${url}: ${tracker.completionStatus()}, ${fields?.emails.length ?? 0} email(s), confidence ${confidence}`);
    return { result, tracker, report };
  }

  private summarize(runs: SiteRun[], startedAt: Date, finishedAt: Date): JobSummary {
    const fetchStats = this.orchestrator.runStats();
    const elapsedMs = finishedAt.getTime() - startedAt.getTime();
    const outcomes = runs.map(run => run.result.outcome);

    return {
      total: runs.length,
      httpSuccess: outcomes.filter(outcome => outcome.kind === 'http-success').length,
      browserSuccess: outcomes.filter(outcome => outcome.kind === 'browser-success').length,
      failed: outcomes.filter(outcome => outcome.kind === 'failed').length,
      skipped: outcomes.filter(outcome => outcome.kind === 'skipped').length,
      retries: fetchStats.retries,
      escalations: fetchStats.escalations,
      startedAt,
      finishedAt,
      elapsedMs,
      throughputPerSecond: elapsedMs > 0 ? runs.length / (elapsedMs / 1000) : 0,
      failedUrls: runs.flatMap(run => {
        const outcome = run.result.outcome;
        return outcome.kind === 'failed' ? [{ url: run.result.url, reason: `${outcome.errorKind}: ${outcome.reason}` }] : [];
      })
    };
  }
}

/**
 * Wire the engine with the default backends: axios for cheap fetches,
 * local Chromium sessions for full renders, cheerio for extraction.
 */
export function createDiscoveryEngine(config: JobConfig, rotator: ProxyRotator): DiscoveryEngine<Session> {
  const pool = new BrowserPool<Session>(
    () => createLocalSession({
      proxy: rotator.next() ?? undefined,
      headless: config.headless,
      userAgent: config.userAgent
    }),
    config.browserPoolSize
  );

  return new DiscoveryEngine<Session>({
    cheapRenderer: new HttpRenderer(),
    fullRenderer: new PlaywrightRenderer(),
    pool,
    rotator,
    extractor: new HtmlExtractor(),
    config
  });
}

type SuccessOutcome = Extract<TerminalOutcome, { kind: 'http-success' | 'browser-success' }>;

function isSuccess(outcome: TerminalOutcome): outcome is SuccessOutcome {
  return outcome.kind === 'http-success' || outcome.kind === 'browser-success';
}

function toPageResult(pageName: string, result: FetchResult): PageResult {
  return {
    pageName,
    url: result.trace.url,
    outcome: result.outcome,
    elapsedMs: result.trace.elapsedMs
  };
}

/**
 * First occurrence of each URL, trimmed, in batch order.
 */
function uniqueUrls(batch: readonly string[]): string[] {
  const seen = new Map<string, string>();
  for (const raw of batch) {
    const url = raw.trim();
    const key = normalizeUrl(url);
    if (!seen.has(key)) {
      seen.set(key, url);
    }
  }
  return [...seen.values()];
}

function methodOf(outcome: TerminalOutcome): ScrapeMethod {
  if (outcome.kind === 'http-success') return 'http';
  if (outcome.kind === 'browser-success') return 'browser';
  return 'none';
}

/**
 * One entry per data source across all fetched pages: completed when any
 * page could read it, with the emails it turned up summed.
 */
function recordDataSources(tracker: VerificationTracker, fields: FieldBag): void {
  for (const source of DATA_SOURCES) {
    const reports = fields.sources.filter(report => report.source === source);
    if (reports.length === 0) continue;

    const emailsFound = reports.reduce((sum, report) => sum + report.emailsFound, 0);
    if (reports.some(report => report.checked)) {
      tracker.markDataSourceChecked(source, 'completed', emailsFound);
    } else {
      tracker.markDataSourceChecked(source, 'failed', 0, source === 'forms' ? 'form_unreadable' : 'unknown');
    }
  }
}

function noEmailReason(home: TerminalOutcome, pagesFetched: number): string {
  switch (home.kind) {
    case 'skipped':
      return `Site skipped: ${home.reason}`;
    case 'failed':
      return `Homepage could not be fetched (${home.reason})`;
    default:
      return `No emails found on ${pagesFetched} page(s) scanned`;
  }
}
