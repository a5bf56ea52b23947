export { FetchOrchestrator } from './engines/fetch-orchestrator.js';
export type { FetchOrchestratorDeps, FetchOptions } from './engines/fetch-orchestrator.js';
export { DiscoveryEngine, createDiscoveryEngine } from './engines/discovery-engine.js';
export { VerificationTracker } from './services/verification-tracker.js';
export type { PageScanDetails } from './services/verification-tracker.js';
export { BrowserPool } from './services/browser-pool.js';
export type { SessionFactory } from './services/browser-pool.js';
export { ProxyRotator } from './services/proxy-rotator.js';
export { HttpRenderer } from './drivers/http.js';
export { PlaywrightRenderer, createLocalSession } from './drivers/browser.js';
export { HtmlExtractor } from './drivers/extractor.js';
export { parseProxyLine, parseProxyList, loadProxyFile } from './drivers/proxy.js';
export { resolveJobConfig, buildProxyRotator, ConfigError } from './drivers/job-config.js';
export { writeJobOutput, toCsv } from './drivers/output.js';
export { validateUrl, normalizeUrl, isBlockedDomain, BLOCKED_DOMAINS } from './core/utils/url-utils.js';
export { decideEscalation, FRAMEWORK_MARKERS } from './core/escalation.js';
export {
  ScrapeError,
  TransientNetworkError,
  RenderFault,
  ExtractionFault,
  ExhaustedRetriesError,
  classifyError
} from './utils/errors.js';
export { logger, LogLevel } from './utils/logger.js';
export { JobConfigSchema } from './types/job.js';
export { FieldBagSchema, DATA_SOURCES } from './types/field-bag.js';
export { REQUIRED_PAGES } from './types/verification.js';
export type { JobConfig, JobConfigInput, JobResult, JobSummary, SiteResult, PageResult } from './types/job.js';
export type { FieldBag, Extractor, RenderedPage } from './types/field-bag.js';
export type {
  CheapRenderer,
  FullRenderer,
  FetchOutcome,
  TerminalOutcome,
  FetchResult,
  FetchTrace,
  ErrorKind,
  RunStats
} from './types/fetch.js';
export type { ProxyEndpoint } from './types/proxy.js';
export type { PoolableSession, Session } from './types/session.js';
export type { CompletionStatus, FailureReason, VerificationSummary } from './types/verification.js';
