/**
 * Types for the per-site discovery verification record
 */

export const REQUIRED_PAGES = [
  'homepage',
  'contact',
  'about',
  'support',
  'help',
  'legal',
  'team',
  'privacy',
  'terms'
] as const;

export type RequiredPage = typeof REQUIRED_PAGES[number];

export type CheckStatus = 'completed' | 'failed' | 'skipped';

export type FailureReason =
  | 'page_blocked'
  | 'timeout'
  | 'unreachable'
  | 'anti_bot_triggered'
  | 'form_unreadable'
  | 'javascript_error'
  | 'network_error'
  | 'unknown';

export type CompletionStatus = 'COMPLETE' | 'INCOMPLETE';

export interface PageScanResult {
  pageName: string;
  url?: string;
  status: CheckStatus;
  failureReason?: FailureReason;
  detail?: string;
  emailsFound: number;
  elapsedMs: number;
  recordedAt: Date;
}

export interface SourceCheckResult {
  sourceName: string;
  status: CheckStatus;
  emailsFound: number;
  failureReason?: FailureReason;
  recordedAt: Date;
}

export interface FailureEvent {
  operation: string;
  reason: FailureReason;
  at: Date;
}

export interface SlowOperation {
  operation: string;
  elapsedMs: number;
  url?: string;
}

export interface FailedStep {
  type: 'page_scan' | 'data_source';
  name: string;
  reason: FailureReason;
  url?: string;
}

export interface Diagnostics {
  totalPagesScanned: number;
  totalDataSourcesChecked: number;
  totalEmailsFound: number;
  totalFailures: number;
  slowOperations: SlowOperation[];
  repeatedFailures: Record<string, number>;
  anomalies: string[];
  recommendations: string[];
}

/**
 * Machine-checkable form of a verification record.
 */
export interface VerificationSummary {
  baseUrl: string;
  status: CompletionStatus;
  completed: boolean;
  startedAt: string;
  finishedAt?: string;
  pages: Record<string, PageScanResult>;
  dataSources: Record<string, SourceCheckResult>;
  emails: string[];
  emailsCleaned: boolean;
  noEmailReason?: string;
  internalLinks: string[];
  incompleteSteps: string[];
  failedSteps: FailedStep[];
  diagnostics: Diagnostics;
}
