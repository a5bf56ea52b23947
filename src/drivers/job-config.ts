/**
 * Job configuration driver
 *
 * - Validates job options against JobConfigSchema and fills in defaults
 * - Applies environment overrides (SCRAPER_USER_AGENT, PROXIES_FILE)
 * - Builds the proxy rotator for a job
 */

import { ZodError } from 'zod';
import { JobConfigSchema } from '../types/job.js';
import type { JobConfig, JobConfigInput } from '../types/job.js';
import { ProxyRotator } from '../services/proxy-rotator.js';
import { loadProxyFile, parseProxyList } from './proxy.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('job-config');

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate job options. An explicit user agent wins over SCRAPER_USER_AGENT.
 * @throws ConfigError listing every invalid option
 */
export function resolveJobConfig(input: JobConfigInput = {}, env: Env = process.env): JobConfig {
  const userAgent = input.userAgent ?? env.SCRAPER_USER_AGENT;

  try {
    const config = JobConfigSchema.parse({ ...input, userAgent: userAgent || undefined });
    log.debug('Resolved job config', config);
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
      throw new ConfigError(`Invalid job configuration: ${issues.join('; ')}`, issues);
    }
    throw error;
  }
}

/**
 * Proxies come from the job's own list when it has one, otherwise from the
 * file named by `proxiesFile` or PROXIES_FILE. With neither, the job runs
 * without proxies.
 */
export async function buildProxyRotator(config: JobConfig, proxiesFile?: string, env: Env = process.env): Promise<ProxyRotator> {
  const options = { maxUsesPerProxy: config.maxUsesPerProxy };

  if (config.proxyList) {
    return new ProxyRotator(parseProxyList(config.proxyList), options);
  }

  const path = proxiesFile ?? env.PROXIES_FILE;
  if (!path) {
    log.verbose('No proxies configured, fetching directly');
    return new ProxyRotator([], options);
  }

  return new ProxyRotator(await loadProxyFile(path), options);
}
