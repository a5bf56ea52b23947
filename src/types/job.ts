import { z } from 'zod';
import { REQUIRED_PAGES } from './verification.js';
import type { FieldBag } from './field-bag.js';
import type { TerminalOutcome, RunStats } from './fetch.js';
import type { VerificationSummary } from './verification.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const SubpageSchema = z.enum(REQUIRED_PAGES).exclude(['homepage']);

export type Subpage = z.infer<typeof SubpageSchema>;

export const JobConfigSchema = z.object({
  maxConcurrent: z.number().int().positive().default(10),
  retryAttempts: z.number().int().positive().default(2),
  rateLimitDelaySeconds: z.number().nonnegative().default(0.5),
  browserPoolSize: z.number().int().positive().default(3),
  forceBrowser: z.boolean().default(false),
  proxyList: z.array(z.string()).optional(),
  minConfidenceScore: z.number().min(0).max(1).default(0),
  cheapTimeoutMs: z.number().int().positive().default(10_000),
  browserTimeoutMs: z.number().int().positive().default(30_000),
  backoffBaseMs: z.number().int().nonnegative().default(1000),
  minTextLength: z.number().int().nonnegative().default(200),
  maxUsesPerProxy: z.number().int().positive().default(7),
  browserRetryAttempts: z.number().int().positive().default(1),
  escalateOnCheapExhaustion: z.boolean().default(false),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  subpages: z.array(SubpageSchema).default(['contact', 'about', 'support', 'help', 'legal', 'team', 'privacy', 'terms']),
  headless: z.boolean().default(true),
});

export type JobConfig = z.infer<typeof JobConfigSchema>;
export type JobConfigInput = z.input<typeof JobConfigSchema>;

export type ScrapeMethod = 'http' | 'browser' | 'none';

export interface PageResult {
  pageName: string;
  url: string;
  outcome: TerminalOutcome;
  elapsedMs: number;
}

/**
 * Per-site result: the merged field bag plus outcome metadata.
 */
export interface SiteResult {
  url: string;
  outcome: TerminalOutcome;
  method: ScrapeMethod;
  fields?: FieldBag;
  confidence: number;
  meetsConfidence: boolean;
  pages: PageResult[];
  startedAt: Date;
  finishedAt: Date;
}

export interface JobSummary extends RunStats {
  elapsedMs: number;
  throughputPerSecond: number;
  failedUrls: Array<{ url: string; reason: string }>;
}

export interface JobResult {
  results: SiteResult[];
  verification: VerificationSummary[];
  reports: Map<string, string>;
  summary: JobSummary;
}
