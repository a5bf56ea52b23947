import type { ProxyEndpoint } from './proxy.js';
import type { FieldBag } from './field-bag.js';
import type { FailureReason } from './verification.js';

export type ErrorKind =
  | 'ValidationRejected'
  | 'TransientNetworkError'
  | 'RenderFault'
  | 'ExtractionFault'
  | 'ExhaustedRetries';

export type FetchState =
  | 'validating'
  | 'trying-cheap'
  | 'escalating-to-browser'
  | 'skipped'
  | 'cheap-succeeded'
  | 'browser-succeeded'
  | 'failed';

/**
 * One attempt against one backend. A fresh request is built for every retry
 * and for the escalation step.
 */
export interface FetchRequest {
  readonly url: string;
  readonly attempt: number;
  readonly proxy?: ProxyEndpoint;
  readonly forceBrowser: boolean;
}

export type FetchOutcome =
  | { kind: 'http-success'; fields: FieldBag }
  | { kind: 'needs-browser'; reason: string }
  | { kind: 'browser-success'; fields: FieldBag }
  | { kind: 'failed'; errorKind: ErrorKind; reason: FailureReason; message: string }
  // Policy exclusion, kept apart from failures
  | { kind: 'skipped'; errorKind: 'ValidationRejected'; reason: string };

export type TerminalOutcome = Exclude<FetchOutcome, { kind: 'needs-browser' }>;

export interface CheapRenderOptions {
  timeoutMs: number;
  proxy?: ProxyEndpoint;
  userAgent: string;
}

export interface CheapRenderResult {
  html: string;
  status: number;
  finalUrl: string;
}

/**
 * Lightweight fetch without script execution. Transport failures are thrown;
 * any HTTP status is returned for the caller to judge.
 */
export interface CheapRenderer {
  renderCheap(url: string, options: CheapRenderOptions): Promise<CheapRenderResult>;
}

export interface FullRenderOptions {
  timeoutMs: number;
  userAgent: string;
}

export interface FullRenderResult {
  html: string;
  finalUrl: string;
  domText: string;
}

/**
 * Browser-driven render on a pooled session.
 */
export interface FullRenderer<S> {
  renderFull(session: S, url: string, options: FullRenderOptions): Promise<FullRenderResult>;
}

export interface FetchTrace {
  url: string;
  state: FetchState;
  requests: FetchRequest[];
  escalationReason?: string;
  startedAt: Date;
  finishedAt: Date;
  elapsedMs: number;
}

export interface FetchResult {
  outcome: TerminalOutcome;
  trace: FetchTrace;
}

export interface RunStats {
  total: number;
  httpSuccess: number;
  browserSuccess: number;
  failed: number;
  skipped: number;
  retries: number;
  escalations: number;
  startedAt?: Date;
  finishedAt?: Date;
}
