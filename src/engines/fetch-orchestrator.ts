import pLimit from 'p-limit';
import { logger } from '../utils/logger.js';
import { normalizeUrl, validateUrl } from '../core/utils/url-utils.js';
import { decideEscalation } from '../core/escalation.js';
import {
  classifyError,
  ExhaustedRetriesError,
  isTransientStatus,
  reasonForStatus,
  ScrapeError,
  TransientNetworkError
} from '../utils/errors.js';
import { backoffDelay, sleep as defaultSleep } from '../utils/timing.js';
import { describeProxy } from '../drivers/proxy.js';
import type { BrowserPool } from '../services/browser-pool.js';
import type { ProxyRotator } from '../services/proxy-rotator.js';
import type { VerificationTracker } from '../services/verification-tracker.js';
import type { Extractor, FieldBag, RenderedPage } from '../types/field-bag.js';
import type { PoolableSession } from '../types/session.js';
import type { JobConfig } from '../types/job.js';
import type { Sleep } from '../utils/timing.js';
import type {
  CheapRenderer,
  CheapRenderResult,
  FetchOutcome,
  FetchRequest,
  FetchResult,
  FetchState,
  FullRenderer,
  FullRenderResult,
  RunStats,
  TerminalOutcome
} from '../types/fetch.js';

const log = logger.createContext('orchestrator');

export interface FetchOrchestratorDeps<S extends PoolableSession> {
  cheapRenderer: CheapRenderer;
  fullRenderer: FullRenderer<S>;
  pool: BrowserPool<S>;
  rotator: ProxyRotator;
  extractor: Extractor;
  config: JobConfig;
  sleep?: Sleep;
}

export interface FetchOptions {
  tracker?: VerificationTracker;
  pageName?: string;
}

interface TraceState {
  state: FetchState;
  requests: FetchRequest[];
  escalationReason?: string;
}

/**
 * Fetches one URL at a time through the hybrid strategy:
 *
 *   validating -> skipped | trying-cheap
 *   trying-cheap -> cheap-succeeded | escalating-to-browser | failed
 *   escalating-to-browser -> browser-succeeded | failed
 *
 * Cheap attempts share a counting semaphore of `maxConcurrent` slots; browser
 * renders are bounded by the pool's capacity. Every call resolves to exactly
 * one terminal outcome and never rejects.
 *
 * Within one run a URL that was skipped or fetched successfully is settled:
 * asking for it again, or while it is in flight, returns the same outcome
 * without touching a backend. Failed URLs are not settled.
 */
export class FetchOrchestrator<S extends PoolableSession> {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly sleep: Sleep;
  private readonly config: JobConfig;
  private stats: RunStats = emptyStats();
  private readonly settled = new Map<string, Promise<TerminalOutcome>>();

  constructor(private readonly deps: FetchOrchestratorDeps<S>) {
    this.config = deps.config;
    this.sleep = deps.sleep ?? defaultSleep;
    this.limit = pLimit(deps.config.maxConcurrent);
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const pageName = options.pageName ?? 'homepage';
    const startedAt = new Date();
    const trace: TraceState = { state: 'validating', requests: [] };
    this.stats.startedAt ??= startedAt;

    const key = normalizeUrl(url);
    const pending = this.settled.get(key);
    let outcome: TerminalOutcome;

    if (pending) {
      outcome = await pending;
      log.verbose(`${url} already settled in this run (${outcome.kind}), not fetching again`);
    } else {
      const running = this.runSafely(url, trace);
      this.settled.set(key, running);
      outcome = await running;
      if (outcome.kind === 'failed' && this.settled.get(key) === running) {
        this.settled.delete(key);
      }
    }

    const finishedAt = new Date();
    const elapsedMs = finishedAt.getTime() - startedAt.getTime();
    trace.state = terminalState(outcome);

    this.writeTracker(options.tracker, pageName, url, outcome, elapsedMs);
    if (!pending) {
      this.record(outcome, finishedAt);
      this.logOutcome(url, outcome, elapsedMs);
    }

    return {
      outcome,
      trace: {
        url,
        state: trace.state,
        requests: trace.requests,
        escalationReason: trace.escalationReason,
        startedAt,
        finishedAt,
        elapsedMs
      }
    };
  }

  runStats(): RunStats {
    return { ...this.stats };
  }

  /**
   * Start a new run: clears the statistics and forgets settled URLs.
   */
  resetStats(): void {
    this.stats = emptyStats();
    this.settled.clear();
  }

  private async runSafely(url: string, trace: TraceState): Promise<TerminalOutcome> {
    try {
      return await this.run(url, trace);
    } catch (error) {
      // Backends classify their own errors; this catches anything that slipped past them.
      const failure = classifyError(error, trace.state === 'escalating-to-browser' ? 'browser' : 'cheap');
      log.error(`Unexpected error while fetching ${url}: ${failure.message}`);
      return failed(failure);
    }
  }

  private async run(url: string, trace: TraceState): Promise<TerminalOutcome> {
    const validation = validateUrl(url);
    if (!validation.valid) {
      return { kind: 'skipped', errorKind: 'ValidationRejected', reason: validation.reason };
    }

    let outcome: FetchOutcome;
    if (this.config.forceBrowser) {
      outcome = { kind: 'needs-browser', reason: 'browser rendering forced' };
    } else {
      trace.state = 'trying-cheap';
      outcome = await this.tryCheap(url, trace);
    }

    if (outcome.kind !== 'needs-browser') {
      return outcome;
    }

    this.stats.escalations++;
    trace.state = 'escalating-to-browser';
    trace.escalationReason = outcome.reason;
    log.verbose(`Escalating ${url} to browser: ${outcome.reason}`);
    return this.tryBrowser(url, trace);
  }

  /**
   * Up to `retryAttempts` plain fetches. Transient failures back off and try
   * again on a fresh proxy; anything that looks like a rendering problem
   * hands the URL to the browser.
   */
  private async tryCheap(url: string, trace: TraceState): Promise<FetchOutcome> {
    const attempts = this.config.retryAttempts;
    const delayMs = this.config.rateLimitDelaySeconds * 1000;
    let lastError: ScrapeError | undefined;

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        this.stats.retries++;
      }

      const proxy = this.deps.rotator.next(attempt > 0) ?? undefined;
      const request: FetchRequest = { url, attempt, proxy, forceBrowser: false };
      trace.requests.push(request);

      let response: CheapRenderResult;
      try {
        response = await this.limit(async () => {
          await this.sleep(delayMs);
          return this.deps.cheapRenderer.renderCheap(url, {
            timeoutMs: this.config.cheapTimeoutMs,
            proxy,
            userAgent: this.config.userAgent
          });
        });
      } catch (error) {
        const failure = classifyError(error, 'cheap');
        log.verbose(`Cheap attempt ${attempt + 1}/${attempts} for ${url} via ${describeProxy(proxy)}: ${failure.reason} (${failure.message})`);
        if (!failure.retryable) {
          return failed(failure);
        }
        lastError = failure;
        await this.backoff(attempt, attempts);
        continue;
      }

      log.verbose(`Cheap attempt ${attempt + 1}/${attempts} for ${url} via ${describeProxy(proxy)}: HTTP ${response.status}`);

      if (isTransientStatus(response.status)) {
        lastError = new TransientNetworkError(`HTTP ${response.status}`, reasonForStatus(response.status));
        await this.backoff(attempt, attempts);
        continue;
      }

      if (response.status >= 400) {
        return { kind: 'needs-browser', reason: `HTTP ${response.status}` };
      }

      const decision = decideEscalation(response.html, this.config.minTextLength);
      if (decision.escalate) {
        return { kind: 'needs-browser', reason: decision.reason };
      }

      const extracted = await this.extract({ url, finalUrl: response.finalUrl, html: response.html, method: 'http' });
      if (extracted instanceof ScrapeError) {
        return failed(extracted);
      }
      return { kind: 'http-success', fields: extracted };
    }

    const last = lastError ?? new TransientNetworkError('No cheap attempt was made');
    if (this.config.escalateOnCheapExhaustion) {
      return { kind: 'needs-browser', reason: `cheap fetch exhausted (${last.reason})` };
    }
    return failed(new ExhaustedRetriesError(attempts, last));
  }

  /**
   * Render on a pooled session. A session that faulted is discarded; one
   * whose page simply was not there goes back to the pool.
   */
  private async tryBrowser(url: string, trace: TraceState): Promise<TerminalOutcome> {
    const attempts = this.config.browserRetryAttempts;
    let lastError: ScrapeError | undefined;

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        this.stats.retries++;
      }
      trace.requests.push({ url, attempt, forceBrowser: true });

      let session: S;
      try {
        session = await this.deps.pool.acquire();
      } catch (error) {
        lastError = classifyError(error, 'browser');
        log.verbose(`Browser attempt ${attempt + 1}/${attempts} for ${url}: no session (${lastError.message})`);
        await this.backoff(attempt, attempts);
        continue;
      }

      let rendered: FullRenderResult;
      try {
        rendered = await this.deps.fullRenderer.renderFull(session, url, {
          timeoutMs: this.config.browserTimeoutMs,
          userAgent: this.config.userAgent
        });
      } catch (error) {
        const failure = classifyError(error, 'browser');
        if (failure.reason === 'unreachable') {
          await this.deps.pool.release(session);
        } else {
          await this.deps.pool.discard(session);
        }
        log.verbose(`Browser attempt ${attempt + 1}/${attempts} for ${url} on ${session.id}: ${failure.reason} (${failure.message})`);
        if (failure.reason === 'unreachable') {
          return failed(failure);
        }
        lastError = failure;
        await this.backoff(attempt, attempts);
        continue;
      }

      await this.deps.pool.release(session);
      log.verbose(`Browser attempt ${attempt + 1}/${attempts} for ${url} on ${session.id}: rendered`);

      const extracted = await this.extract({
        url,
        finalUrl: rendered.finalUrl,
        html: rendered.html,
        method: 'browser',
        domText: rendered.domText
      });
      if (extracted instanceof ScrapeError) {
        return failed(extracted);
      }
      return { kind: 'browser-success', fields: extracted };
    }

    const last = lastError ?? new TransientNetworkError('No browser attempt was made');
    return failed(attempts > 1 ? new ExhaustedRetriesError(attempts, last) : last);
  }

  private async extract(page: RenderedPage): Promise<FieldBag | ScrapeError> {
    try {
      return await this.deps.extractor.extract(page);
    } catch (error) {
      return classifyError(error, 'extract');
    }
  }

  /**
   * Wait before the next attempt. Runs outside the semaphore so a sleeping
   * retry does not hold a fetch slot.
   */
  private async backoff(attempt: number, attempts: number): Promise<void> {
    if (attempt + 1 >= attempts) return;
    await this.sleep(backoffDelay(attempt, this.config.backoffBaseMs));
  }

  private record(outcome: TerminalOutcome, finishedAt: Date): void {
    this.stats.total++;
    this.stats.finishedAt = finishedAt;
    switch (outcome.kind) {
      case 'http-success':
        this.stats.httpSuccess++;
        break;
      case 'browser-success':
        this.stats.browserSuccess++;
        break;
      case 'failed':
        this.stats.failed++;
        break;
      case 'skipped':
        this.stats.skipped++;
        break;
    }
  }

  private writeTracker(
    tracker: VerificationTracker | undefined,
    pageName: string,
    url: string,
    outcome: TerminalOutcome,
    elapsedMs: number
  ): void {
    if (!tracker) return;

    switch (outcome.kind) {
      case 'http-success':
      case 'browser-success':
        tracker.markPageScanned(pageName, 'completed', {
          url,
          elapsedMs,
          emailsFound: outcome.fields.emails.length,
          detail: outcome.kind === 'http-success' ? 'http' : 'browser'
        });
        break;
      case 'failed':
        tracker.markPageScanned(pageName, 'failed', {
          url,
          elapsedMs,
          failureReason: outcome.reason,
          detail: `${outcome.errorKind}: ${outcome.message}`
        });
        break;
      case 'skipped':
        tracker.markPageScanned(pageName, 'skipped', { url, elapsedMs, detail: outcome.reason });
        break;
    }
  }

  private logOutcome(url: string, outcome: TerminalOutcome, elapsedMs: number): void {
    switch (outcome.kind) {
      case 'http-success':
        logger.success(url, `HTTP, ${outcome.fields.emails.length} email(s) in ${elapsedMs}ms`);
        break;
      case 'browser-success':
        logger.success(url, `BROWSER, ${outcome.fields.emails.length} email(s) in ${elapsedMs}ms`);
        break;
      case 'failed':
        logger.failure(url, `${outcome.errorKind} (${outcome.reason}): ${outcome.message}`);
        break;
      case 'skipped':
        logger.skip(url, outcome.reason);
        break;
    }
  }
}

function failed(error: ScrapeError): TerminalOutcome {
  return { kind: 'failed', errorKind: error.kind, reason: error.reason, message: error.message };
}

function terminalState(outcome: TerminalOutcome): FetchState {
  switch (outcome.kind) {
    case 'http-success':
      return 'cheap-succeeded';
    case 'browser-success':
      return 'browser-succeeded';
    case 'failed':
      return 'failed';
    case 'skipped':
      return 'skipped';
  }
}

function emptyStats(): RunStats {
  return {
    total: 0,
    httpSuccess: 0,
    browserSuccess: 0,
    failed: 0,
    skipped: 0,
    retries: 0,
    escalations: 0
  };
}
