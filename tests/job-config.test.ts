import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveJobConfig, buildProxyRotator, ConfigError } from '../src/drivers/job-config.js';
import { DEFAULT_USER_AGENT } from '../src/types/job.js';

describe('resolveJobConfig', () => {
  it('should fill in the defaults', () => {
    const config = resolveJobConfig({}, {});

    expect(config).toMatchObject({
      maxConcurrent: 10,
      retryAttempts: 2,
      rateLimitDelaySeconds: 0.5,
      browserPoolSize: 3,
      forceBrowser: false,
      minConfidenceScore: 0,
      cheapTimeoutMs: 10_000,
      browserTimeoutMs: 30_000,
      backoffBaseMs: 1000,
      minTextLength: 200,
      maxUsesPerProxy: 7,
      browserRetryAttempts: 1,
      escalateOnCheapExhaustion: false,
      userAgent: DEFAULT_USER_AGENT,
      headless: true
    });
    expect(config.subpages).toEqual(['contact', 'about', 'support', 'help', 'legal', 'team', 'privacy', 'terms']);
    expect(config.proxyList).toBeUndefined();
  });

  it('should take the user agent from the environment unless given', () => {
    expect(resolveJobConfig({}, { SCRAPER_USER_AGENT: 'TestAgent/1.0' }).userAgent).toBe('TestAgent/1.0');
    expect(resolveJobConfig({ userAgent: 'Explicit/2.0' }, { SCRAPER_USER_AGENT: 'TestAgent/1.0' }).userAgent).toBe('Explicit/2.0');
  });

  it('should list every invalid option', () => {
    try {
      resolveJobConfig({ maxConcurrent: 0, minConfidenceScore: 2 }, {});
      expect.unreachable('resolveJobConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^maxConcurrent: /);
        expect(error.issues[1]).toMatch(/^minConfidenceScore: /);
      }
    }
  });

  it('should reject an unknown sub-page', () => {
    expect(() => resolveJobConfig({ subpages: ['homepage'] }, {})).toThrow(ConfigError);
  });
});

describe('buildProxyRotator', () => {
  it('should prefer the job proxy list', async () => {
    const config = resolveJobConfig({ proxyList: ['10.0.0.1:8080', '10.0.0.2:8080'] }, {});

    const rotator = await buildProxyRotator(config, undefined, { PROXIES_FILE: '/does/not/matter.txt' });

    expect(rotator.size).toBe(2);
    expect(rotator.next()?.server).toBe('http://10.0.0.1:8080');
  });

  it('should read the file named by PROXIES_FILE', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'proxies-'));
    const path = join(dir, 'proxies.txt');
    await writeFile(path, '10.0.0.3:3128\n');

    const rotator = await buildProxyRotator(resolveJobConfig({}, {}), undefined, { PROXIES_FILE: path });

    expect(rotator.current()?.server).toBe('http://10.0.0.3:3128');
  });

  it('should run without proxies by default', async () => {
    const rotator = await buildProxyRotator(resolveJobConfig({}, {}), undefined, {});

    expect(rotator.size).toBe(0);
    expect(rotator.next()).toBeNull();
  });
});
