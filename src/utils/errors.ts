/**
 * Error taxonomy for fetch attempts.
 * Every thrown error is mapped onto one of these before the orchestrator
 * decides whether to retry, escalate or fail the URL.
 */

import axios from 'axios';
import { errors as playwrightErrors } from 'playwright';
import type { ErrorKind } from '../types/fetch.js';
import type { FailureReason } from '../types/verification.js';
import { errorMessage, isBrowserError } from './error-handlers.js';

export type ErrorPhase = 'cheap' | 'browser' | 'extract';

export class ScrapeError extends Error {
  public readonly kind: ErrorKind;
  public readonly reason: FailureReason;
  public readonly retryable: boolean;

  constructor(message: string, kind: ErrorKind, reason: FailureReason, retryable: boolean, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.kind = kind;
    this.reason = reason;
    this.retryable = retryable;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.kind,
      reason: this.reason,
      message: this.message,
    };
  }
}

export class TransientNetworkError extends ScrapeError {
  constructor(message: string, reason: FailureReason = 'network_error', cause?: unknown) {
    super(message, 'TransientNetworkError', reason, true, cause);
  }
}

export class RenderFault extends ScrapeError {
  constructor(message: string, reason: FailureReason = 'javascript_error', cause?: unknown) {
    super(message, 'RenderFault', reason, false, cause);
  }
}

export class ExtractionFault extends ScrapeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ExtractionFault', 'unknown', false, cause);
  }
}

export class ExhaustedRetriesError extends ScrapeError {
  public readonly attempts: number;

  constructor(attempts: number, last: ScrapeError) {
    super(`Gave up after ${attempts} attempt(s): ${last.message}`, 'ExhaustedRetries', last.reason, false, last);
    this.attempts = attempts;
  }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const UNREACHABLE_CODES = new Set(['ENOTFOUND', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN']);

/**
 * Map an HTTP status from the cheap path to a tracker failure reason.
 */
export function reasonForStatus(status: number): FailureReason {
  if (status === 401 || status === 403) return 'page_blocked';
  if (status === 429) return 'anti_bot_triggered';
  if (status === 404 || status === 410) return 'unreachable';
  if (status >= 500) return 'network_error';
  return 'unknown';
}

/**
 * Statuses worth retrying on the cheap path: throttling and server errors.
 */
export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Turn anything thrown by a backend or the extractor into a ScrapeError.
 */
export function classifyError(error: unknown, phase: ErrorPhase): ScrapeError {
  if (error instanceof ScrapeError) {
    return error;
  }

  const message = errorMessage(error);

  if (phase === 'extract') {
    return new ExtractionFault(`Extraction failed: ${message}`, error);
  }

  if (axios.isAxiosError(error)) {
    const code = error.code ?? '';
    if (TIMEOUT_CODES.has(code) || /timeout/i.test(message)) {
      return new TransientNetworkError(message, 'timeout', error);
    }
    if (UNREACHABLE_CODES.has(code)) {
      return new TransientNetworkError(message, 'unreachable', error);
    }
    return new TransientNetworkError(message, 'network_error', error);
  }

  if (error instanceof playwrightErrors.TimeoutError) {
    return new RenderFault(message, 'timeout', error);
  }

  if (phase === 'browser') {
    if (/net::ERR_/i.test(message)) {
      return new RenderFault(message, 'unreachable', error);
    }
    if (/timeout/i.test(message)) {
      return new RenderFault(message, 'timeout', error);
    }
    return new RenderFault(message, isBrowserError(message) ? 'unknown' : 'javascript_error', error);
  }

  if (/timeout|timed out/i.test(message)) {
    return new TransientNetworkError(message, 'timeout', error);
  }
  return new TransientNetworkError(message, 'network_error', error);
}
