import { describe, it, expect, vi } from 'vitest';
import { AxiosError } from 'axios';
import { FetchOrchestrator } from '../src/engines/fetch-orchestrator.js';
import { BrowserPool } from '../src/services/browser-pool.js';
import { ProxyRotator } from '../src/services/proxy-rotator.js';
import { VerificationTracker } from '../src/services/verification-tracker.js';
import { RenderFault } from '../src/utils/errors.js';
import {
  FakeCheapRenderer,
  FakeFullRenderer,
  emailExtractor,
  ok,
  sessionFactory,
  staticPage,
  testConfig
} from './fakes.js';
import type { CheapHandler, FakeSession, FullHandler } from './fakes.js';
import type { Extractor } from '../src/types/field-bag.js';
import type { JobConfigInput } from '../src/types/job.js';
import type { ProxyEndpoint } from '../src/types/proxy.js';

const CONTACT_HTML = staticPage('<a href="mailto:hello@bakery.example">Write to us</a>');

interface SetupOptions {
  cheap?: CheapHandler;
  full?: FullHandler;
  config?: JobConfigInput;
  proxies?: ProxyEndpoint[];
  extractor?: Extractor;
}

function setup(options: SetupOptions = {}) {
  const config = testConfig(options.config);
  const cheap = new FakeCheapRenderer(options.cheap ?? (async () => ok(CONTACT_HTML)));
  const full = new FakeFullRenderer(options.full ?? (async (_session, url) => ({ html: CONTACT_HTML, finalUrl: url, domText: '' })));
  const { factory, created } = sessionFactory();
  const pool = new BrowserPool<FakeSession>(factory, config.browserPoolSize);
  const rotator = new ProxyRotator(options.proxies ?? [], { maxUsesPerProxy: config.maxUsesPerProxy });
  const sleeps: number[] = [];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  const orchestrator = new FetchOrchestrator<FakeSession>({
    cheapRenderer: cheap,
    fullRenderer: full,
    pool,
    rotator,
    extractor: options.extractor ?? emailExtractor(),
    config,
    sleep
  });

  return { orchestrator, cheap, full, pool, factory, created, sleeps };
}

function timeoutError(): AxiosError {
  return new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED');
}

describe('FetchOrchestrator', () => {
  describe('validation', () => {
    it('should skip denylisted platforms without touching any backend', async () => {
      const { orchestrator, cheap, full, factory } = setup();

      for (const url of ['https://facebook.com/x', 'https://www.instagram.com/bakery', 'https://m.youtube.com/watch']) {
        const { outcome, trace } = await orchestrator.fetch(url);
        expect(outcome.kind).toBe('skipped');
        expect(trace.state).toBe('skipped');
        expect(trace.requests).toEqual([]);
      }

      expect(cheap.calls).toHaveLength(0);
      expect(full.calls).toHaveLength(0);
      expect(factory).not.toHaveBeenCalled();
    });

    it('should skip URLs without an http(s) scheme or dotted host', async () => {
      const { orchestrator, cheap } = setup();

      const noScheme = await orchestrator.fetch('bakery.example');
      const ftp = await orchestrator.fetch('ftp://bakery.example');
      const bareHost = await orchestrator.fetch('http://localhost');

      expect(noScheme.outcome).toEqual({ kind: 'skipped', errorKind: 'ValidationRejected', reason: 'URL must start with http:// or https://' });
      expect(ftp.outcome.kind).toBe('skipped');
      expect(bareHost.outcome).toEqual({ kind: 'skipped', errorKind: 'ValidationRejected', reason: 'Invalid URL format (missing domain)' });
      expect(cheap.calls).toHaveLength(0);
    });

    it('should record a skipped page in the tracker', async () => {
      const { orchestrator } = setup();
      const tracker = new VerificationTracker('https://facebook.com/x');

      await orchestrator.fetch('https://facebook.com/x', { tracker, pageName: 'homepage' });

      expect(tracker.page('homepage')?.status).toBe('skipped');
    });
  });

  describe('cheap path', () => {
    it('should return http-success for a static page', async () => {
      const { orchestrator, full } = setup();

      const { outcome, trace } = await orchestrator.fetch('https://bakery.example');

      expect(outcome.kind).toBe('http-success');
      if (outcome.kind === 'http-success') {
        expect(outcome.fields.emails).toEqual(['hello@bakery.example']);
      }
      expect(trace.state).toBe('cheap-succeeded');
      expect(trace.requests).toHaveLength(1);
      expect(full.calls).toHaveLength(0);
    });

    it('should report a timeout as exhausted retries with reason timeout', async () => {
      const { orchestrator, cheap } = setup({
        config: { retryAttempts: 1 },
        cheap: async () => {
          throw timeoutError();
        }
      });
      const tracker = new VerificationTracker('https://slow.example');

      const { outcome } = await orchestrator.fetch('https://slow.example', { tracker });

      expect(outcome).toEqual({
        kind: 'failed',
        errorKind: 'ExhaustedRetries',
        reason: 'timeout',
        message: 'Gave up after 1 attempt(s): timeout of 10000ms exceeded'
      });
      expect(cheap.calls).toHaveLength(1);
      expect(tracker.page('homepage')?.status).toBe('failed');
      expect(tracker.page('homepage')?.failureReason).toBe('timeout');
    });

    it('should fail when the success would only come after the attempt budget', async () => {
      let calls = 0;
      const { orchestrator, cheap } = setup({
        config: { retryAttempts: 2 },
        cheap: async () => {
          calls++;
          if (calls <= 2) throw timeoutError();
          return ok(CONTACT_HTML);
        }
      });

      const { outcome } = await orchestrator.fetch('https://flaky.example');

      expect(outcome.kind).toBe('failed');
      if (outcome.kind === 'failed') {
        expect(outcome.errorKind).toBe('ExhaustedRetries');
      }
      expect(cheap.calls).toHaveLength(2);
    });

    it('should succeed when the budget covers the failures', async () => {
      let calls = 0;
      const { orchestrator } = setup({
        config: { retryAttempts: 3 },
        cheap: async () => {
          calls++;
          if (calls <= 2) throw timeoutError();
          return ok(CONTACT_HTML);
        }
      });

      const { outcome } = await orchestrator.fetch('https://flaky.example');

      expect(outcome.kind).toBe('http-success');
      expect(orchestrator.runStats().retries).toBe(2);
    });

    it('should back off exponentially between attempts only', async () => {
      const { orchestrator, sleeps } = setup({
        config: { retryAttempts: 3, backoffBaseMs: 100 },
        cheap: async () => {
          throw timeoutError();
        }
      });

      await orchestrator.fetch('https://slow.example');

      // Zero inter-request delay before each attempt, backoff after the first two
      expect(sleeps).toEqual([0, 100, 0, 200, 0]);
    });

    it('should wait the inter-request delay before each attempt', async () => {
      const { orchestrator, sleeps } = setup({ config: { rateLimitDelaySeconds: 0.5 } });

      await orchestrator.fetch('https://bakery.example');

      expect(sleeps).toEqual([500]);
    });

    it('should force a proxy rotation on every retry', async () => {
      const proxies = [{ server: 'http://10.0.0.1:8080' }, { server: 'http://10.0.0.2:8080' }];
      const { orchestrator, cheap } = setup({
        proxies,
        config: { retryAttempts: 3 },
        cheap: async () => {
          throw timeoutError();
        }
      });

      await orchestrator.fetch('https://slow.example');

      expect(cheap.calls.map(call => call.options.proxy?.server)).toEqual([
        'http://10.0.0.1:8080',
        'http://10.0.0.2:8080',
        'http://10.0.0.1:8080'
      ]);
    });

    it('should retry 5xx and throttling statuses', async () => {
      let calls = 0;
      const { orchestrator } = setup({
        config: { retryAttempts: 2 },
        cheap: async () => {
          calls++;
          return calls === 1 ? { html: '', status: 503, finalUrl: '' } : ok(CONTACT_HTML);
        }
      });

      const { outcome } = await orchestrator.fetch('https://busy.example');

      expect(outcome.kind).toBe('http-success');
    });

    it('should keep the reason of the last throttled attempt', async () => {
      const { orchestrator } = setup({
        config: { retryAttempts: 1 },
        cheap: async () => ({ html: '', status: 429, finalUrl: '' })
      });

      const { outcome } = await orchestrator.fetch('https://busy.example');

      expect(outcome).toEqual({
        kind: 'failed',
        errorKind: 'ExhaustedRetries',
        reason: 'anti_bot_triggered',
        message: 'Gave up after 1 attempt(s): HTTP 429'
      });
    });

    it('should limit concurrent cheap fetches to maxConcurrent', async () => {
      let inFlight = 0;
      let peak = 0;
      const { orchestrator } = setup({
        config: { maxConcurrent: 2 },
        cheap: async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise(resolve => setTimeout(resolve, 10));
          inFlight--;
          return ok(CONTACT_HTML);
        }
      });

      const urls = ['a', 'b', 'c', 'd', 'e'].map(name => `https://${name}.example`);
      const results = await Promise.all(urls.map(url => orchestrator.fetch(url)));

      expect(results.every(result => result.outcome.kind === 'http-success')).toBe(true);
      expect(peak).toBe(2);
    });

    it('should not retry an extraction fault', async () => {
      const extractor: Extractor = {
        extract: vi.fn(async () => {
          throw new Error('unexpected markup');
        })
      };
      const { orchestrator, cheap } = setup({ extractor, config: { retryAttempts: 3 } });

      const { outcome } = await orchestrator.fetch('https://bakery.example');

      expect(outcome).toEqual({
        kind: 'failed',
        errorKind: 'ExtractionFault',
        reason: 'unknown',
        message: 'Extraction failed: unexpected markup'
      });
      expect(cheap.calls).toHaveLength(1);
    });
  });

  describe('escalation', () => {
    it('should escalate a page carrying a framework marker', async () => {
      const { orchestrator, full } = setup({
        cheap: async () => ok('<html><body><div id="__next"></div><script id="__NEXT_DATA__">{}</script></body></html>')
      });

      const { outcome, trace } = await orchestrator.fetch('https://spa.example');

      expect(outcome.kind).toBe('browser-success');
      expect(trace.state).toBe('browser-succeeded');
      expect(trace.escalationReason).toBe("framework marker '__next_data__'");
      expect(full.calls).toHaveLength(1);
      expect(orchestrator.runStats().escalations).toBe(1);
    });

    it('should escalate a page with too little visible text', async () => {
      const { orchestrator } = setup({ cheap: async () => ok('<html><body>Hello</body></html>') });

      const { trace } = await orchestrator.fetch('https://thin.example');

      expect(trace.escalationReason).toBe('visible text 5 < 200 chars');
    });

    it('should escalate a blocking status', async () => {
      const { orchestrator, cheap } = setup({
        config: { retryAttempts: 3 },
        cheap: async () => ({ html: 'Forbidden', status: 403, finalUrl: '' })
      });

      const { outcome, trace } = await orchestrator.fetch('https://guarded.example');

      expect(outcome.kind).toBe('browser-success');
      expect(trace.escalationReason).toBe('HTTP 403');
      expect(cheap.calls).toHaveLength(1);
    });

    it('should skip the cheap path when the browser is forced', async () => {
      const { orchestrator, cheap } = setup({ config: { forceBrowser: true } });

      const { outcome, trace } = await orchestrator.fetch('https://bakery.example');

      expect(outcome.kind).toBe('browser-success');
      expect(cheap.calls).toHaveLength(0);
      expect(trace.requests).toEqual([{ url: 'https://bakery.example', attempt: 0, forceBrowser: true }]);
    });

    it('should escalate after exhausting the cheap path when configured', async () => {
      const { orchestrator } = setup({
        config: { retryAttempts: 1, escalateOnCheapExhaustion: true },
        cheap: async () => {
          throw timeoutError();
        }
      });

      const { outcome, trace } = await orchestrator.fetch('https://slow.example');

      expect(outcome.kind).toBe('browser-success');
      expect(trace.escalationReason).toBe('cheap fetch exhausted (timeout)');
    });

    it('should hand the DOM text snapshot to the extractor', async () => {
      const extractor = emailExtractor();
      const { orchestrator } = setup({
        extractor,
        config: { forceBrowser: true },
        full: async (_session, url) => ({ html: CONTACT_HTML, finalUrl: url, domText: 'Write to us' })
      });

      await orchestrator.fetch('https://bakery.example');

      expect(extractor.pages[0]).toMatchObject({ method: 'browser', domText: 'Write to us' });
    });
  });

  describe('browser sessions', () => {
    it('should release a healthy session back to the pool', async () => {
      const { orchestrator, pool } = setup({ config: { forceBrowser: true } });

      await orchestrator.fetch('https://bakery.example');
      await orchestrator.fetch('https://cafe.example');

      expect(pool.stats()).toMatchObject({ created: 1, idle: 1, inUse: 0, destroyed: 0 });
    });

    it('should discard a session that faulted', async () => {
      const { orchestrator, pool, created } = setup({
        config: { forceBrowser: true },
        full: async () => {
          throw new Error('Target closed');
        }
      });

      const { outcome } = await orchestrator.fetch('https://bakery.example');

      expect(outcome).toEqual({ kind: 'failed', errorKind: 'RenderFault', reason: 'unknown', message: 'Target closed' });
      expect(created[0].cleanedUp).toBe(true);
      expect(pool.size).toBe(0);
      expect(pool.stats().destroyed).toBe(1);
    });

    it('should keep the session when the page itself is missing', async () => {
      const { orchestrator, pool, created } = setup({
        config: { forceBrowser: true, browserRetryAttempts: 3 },
        full: async (_session, url) => {
          throw new RenderFault(`HTTP 404 for ${url}`, 'unreachable');
        }
      });

      const { outcome } = await orchestrator.fetch('https://bakery.example/team');

      expect(outcome).toMatchObject({ kind: 'failed', errorKind: 'RenderFault', reason: 'unreachable' });
      expect(created[0].cleanedUp).toBe(false);
      expect(pool.stats()).toMatchObject({ idle: 1, destroyed: 0 });
    });

    it('should retry the render on a fresh session when allowed', async () => {
      let renders = 0;
      const { orchestrator, factory } = setup({
        config: { forceBrowser: true, browserRetryAttempts: 2 },
        full: async (_session, url) => {
          renders++;
          if (renders === 1) throw new Error('page crashed');
          return { html: CONTACT_HTML, finalUrl: url, domText: '' };
        }
      });

      const { outcome } = await orchestrator.fetch('https://bakery.example');

      expect(outcome.kind).toBe('browser-success');
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('should report exhausted browser retries', async () => {
      const { orchestrator } = setup({
        config: { forceBrowser: true, browserRetryAttempts: 2 },
        full: async () => {
          throw new Error('Navigation failed because page crashed!');
        }
      });

      const { outcome } = await orchestrator.fetch('https://bakery.example');

      expect(outcome).toMatchObject({ kind: 'failed', errorKind: 'ExhaustedRetries' });
    });

    it('should fail the URL when no session can be created', async () => {
      const config = testConfig({ forceBrowser: true });
      const pool = new BrowserPool<FakeSession>(async () => {
        throw new Error('Executable doesn\'t exist');
      }, 1);
      const orchestrator = new FetchOrchestrator<FakeSession>({
        cheapRenderer: new FakeCheapRenderer(async () => ok(CONTACT_HTML)),
        fullRenderer: new FakeFullRenderer(async (_session, url) => ({ html: CONTACT_HTML, finalUrl: url, domText: '' })),
        pool,
        rotator: new ProxyRotator([]),
        extractor: emailExtractor(),
        config,
        sleep: async () => undefined
      });

      const { outcome } = await orchestrator.fetch('https://bakery.example');

      expect(outcome).toMatchObject({ kind: 'failed', errorKind: 'RenderFault' });
      expect(pool.size).toBe(0);
    });
  });

  describe('settled URLs', () => {
    it('should not fetch a successful URL again in the same run', async () => {
      const { orchestrator, cheap } = setup();
      const tracker = new VerificationTracker('https://good.example');

      const first = await orchestrator.fetch('https://good.example');
      const second = await orchestrator.fetch('https://Good.example/', { tracker, pageName: 'homepage' });

      expect(cheap.calls).toHaveLength(1);
      expect(second.outcome).toEqual(first.outcome);
      expect(second.trace.state).toBe('cheap-succeeded');
      expect(second.trace.requests).toEqual([]);
      expect(tracker.page('homepage')?.status).toBe('completed');
      expect(orchestrator.runStats()).toMatchObject({ total: 1, httpSuccess: 1 });
    });

    it('should share one fetch between concurrent requests for the same URL', async () => {
      const { orchestrator, cheap } = setup();

      const results = await Promise.all([
        orchestrator.fetch('https://good.example'),
        orchestrator.fetch('https://good.example')
      ]);

      expect(cheap.calls).toHaveLength(1);
      expect(results.map(result => result.outcome.kind)).toEqual(['http-success', 'http-success']);
    });

    it('should not settle a skipped URL twice', async () => {
      const { orchestrator } = setup();

      await orchestrator.fetch('https://facebook.com/x');
      const again = await orchestrator.fetch('https://facebook.com/x');

      expect(again.outcome.kind).toBe('skipped');
      expect(orchestrator.runStats()).toMatchObject({ total: 1, skipped: 1 });
    });

    it('should try a failed URL again', async () => {
      const { orchestrator, cheap } = setup({
        config: { retryAttempts: 1 },
        cheap: async () => {
          throw timeoutError();
        }
      });

      await orchestrator.fetch('https://slow.example');
      await orchestrator.fetch('https://slow.example');

      expect(cheap.calls).toHaveLength(2);
      expect(orchestrator.runStats()).toMatchObject({ total: 2, failed: 2 });
    });

    it('should forget settled URLs when a new run starts', async () => {
      const { orchestrator, cheap } = setup();

      await orchestrator.fetch('https://good.example');
      orchestrator.resetStats();
      await orchestrator.fetch('https://good.example');

      expect(cheap.calls).toHaveLength(2);
    });
  });

  describe('statistics', () => {
    it('should count each terminal outcome once', async () => {
      const { orchestrator } = setup({
        config: { retryAttempts: 1 },
        cheap: async url => {
          if (url.includes('slow')) throw timeoutError();
          return ok(CONTACT_HTML);
        }
      });

      await orchestrator.fetch('https://good.example');
      await orchestrator.fetch('https://facebook.com/x');
      await orchestrator.fetch('https://slow.example');

      expect(orchestrator.runStats()).toMatchObject({
        total: 3,
        httpSuccess: 1,
        browserSuccess: 0,
        failed: 1,
        skipped: 1,
        retries: 0,
        escalations: 0
      });
    });
  });
});
