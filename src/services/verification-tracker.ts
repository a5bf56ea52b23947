import { logger, formatTime } from '../utils/logger.js';
import { DATA_SOURCES } from '../types/field-bag.js';
import { REQUIRED_PAGES } from '../types/verification.js';
import type {
  CheckStatus,
  CompletionStatus,
  Diagnostics,
  FailedStep,
  FailureEvent,
  FailureReason,
  PageScanResult,
  SlowOperation,
  SourceCheckResult,
  VerificationSummary
} from '../types/verification.js';

const log = logger.createContext('verification');

export const REPEATED_FAILURE_THRESHOLD = 3;
export const SLOW_OPERATION_MS = 10_000;
export const HIGH_FAILURE_COUNT = 5;

const RULE = '='.repeat(80);

export interface PageScanDetails {
  url?: string;
  failureReason?: FailureReason;
  detail?: string;
  elapsedMs?: number;
  emailsFound?: number;
}

/**
 * Per-site audit of the discovery process. It records which required pages
 * and data sources were inspected and what they produced, and derives a
 * conjunctive completeness verdict. It never retries or cancels anything.
 *
 * Mutators are synchronous and never throw, so concurrent page tasks of the
 * same job interleave whole writes, never partial ones. A page or source
 * written twice keeps the most recent entry. After `report()` the record is
 * sealed and further writes are dropped.
 */
export class VerificationTracker {
  readonly baseUrl: string;
  readonly startedAt: Date;
  private finishedAt?: Date;

  private readonly pagesScanned = new Map<string, PageScanResult>();
  private readonly dataSourcesChecked = new Map<string, SourceCheckResult>();
  private readonly emailsFound = new Set<string>();
  private readonly failures: FailureEvent[] = [];
  private readonly slowOperations: SlowOperation[] = [];
  private readonly repeatedFailures = new Map<string, number>();
  private readonly anomalies: string[] = [];
  private internalLinks: string[] = [];
  private internalLinksChecked = false;
  private emailsCleaned = false;
  private noEmailReason?: string;
  private completed = false;
  private sealed = false;

  constructor(baseUrl: string, private readonly now: () => Date = () => new Date()) {
    this.baseUrl = baseUrl;
    this.startedAt = now();
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  // Mutators

  markPageScanned(name: string, outcome: CheckStatus, details: PageScanDetails = {}): void {
    if (!this.writable(`page '${name}'`)) return;

    if (!isRequiredPage(name)) {
      this.noteAnomaly(`Unrecognized page '${name}' recorded`);
    }

    const elapsedMs = details.elapsedMs ?? 0;
    const failureReason = outcome === 'failed' ? details.failureReason ?? 'unknown' : details.failureReason;

    this.pagesScanned.set(name, {
      pageName: name,
      url: details.url,
      status: outcome,
      failureReason,
      detail: details.detail,
      emailsFound: details.emailsFound ?? 0,
      elapsedMs,
      recordedAt: this.now()
    });

    if (outcome === 'failed') {
      this.trackFailure(name, failureReason ?? 'unknown');
    }

    if (elapsedMs > SLOW_OPERATION_MS) {
      this.slowOperations.push({ operation: `scan_${name}`, elapsedMs, url: details.url });
    }
  }

  markDataSourceChecked(
    name: string,
    outcome: CheckStatus,
    emailsFound = 0,
    failureReason?: FailureReason
  ): void {
    if (!this.writable(`data source '${name}'`)) return;

    if (!isRequiredSource(name)) {
      this.noteAnomaly(`Unrecognized data source '${name}' recorded`);
    }

    const reason = outcome === 'failed' ? failureReason ?? 'unknown' : failureReason;
    this.dataSourcesChecked.set(name, {
      sourceName: name,
      status: outcome,
      emailsFound: Math.max(0, emailsFound),
      failureReason: reason,
      recordedAt: this.now()
    });

    if (outcome === 'failed') {
      this.trackFailure(`data_source_${name}`, reason ?? 'unknown');
    }
  }

  markInternalLinksChecked(links: readonly string[]): void {
    if (!this.writable('internal links')) return;
    this.internalLinksChecked = true;
    this.internalLinks = [...links];
  }

  addEmails(emails: Iterable<string>): void {
    if (!this.writable('emails')) return;
    for (const email of emails) {
      const normalized = email.trim().toLowerCase();
      if (normalized) {
        this.emailsFound.add(normalized);
      }
    }
  }

  markEmailsCleaned(): void {
    if (!this.writable('emails cleaned flag')) return;
    this.emailsCleaned = true;
  }

  setNoEmailReason(reason: string): void {
    if (!this.writable('no-email reason')) return;
    const trimmed = reason.trim();
    if (!trimmed) {
      this.noteAnomaly('Empty no-email reason ignored');
      return;
    }
    this.noEmailReason = trimmed;
  }

  /**
   * The job's terminal step. Until this runs the record stays INCOMPLETE,
   * however many entries it holds.
   */
  finalize(): void {
    if (!this.writable('completion')) return;
    this.completed = true;
    this.finishedAt = this.now();
  }

  // Readers

  completionStatus(): CompletionStatus {
    return this.incompleteSteps().length === 0 ? 'COMPLETE' : 'INCOMPLETE';
  }

  incompleteSteps(): string[] {
    const incomplete: string[] = [];

    for (const page of REQUIRED_PAGES) {
      if (!this.pagesScanned.has(page)) {
        incomplete.push(page === 'homepage' ? 'Homepage not scanned' : `Page '${page}' not scanned`);
      }
    }

    for (const source of DATA_SOURCES) {
      if (!this.dataSourcesChecked.has(source)) {
        incomplete.push(`Data source '${source}' not checked`);
      }
    }

    if (this.emailsFound.size > 0 && !this.emailsCleaned) {
      incomplete.push('Emails found but not cleaned/formatted');
    }
    if (this.emailsFound.size === 0 && this.noEmailReason === undefined) {
      incomplete.push('No emails found but no reason provided');
    }

    if (!this.completed) {
      incomplete.push('Job not finalized');
    }

    return incomplete;
  }

  failedSteps(): FailedStep[] {
    const failed: FailedStep[] = [];

    for (const [name, result] of this.pagesScanned) {
      if (result.status === 'failed') {
        failed.push({ type: 'page_scan', name, reason: result.failureReason ?? 'unknown', url: result.url });
      }
    }

    for (const [name, check] of this.dataSourcesChecked) {
      if (check.status === 'failed') {
        failed.push({ type: 'data_source', name, reason: check.failureReason ?? 'unknown' });
      }
    }

    return failed;
  }

  diagnostics(): Diagnostics {
    const recommendations: string[] = [];

    if (this.failures.length > HIGH_FAILURE_COUNT) {
      recommendations.push('High failure rate - consider checking network/proxy');
    }

    for (const op of this.slowOperations) {
      recommendations.push(`Slow operation: ${op.operation} took ${formatTime(op.elapsedMs)} - consider increasing timeout`);
    }

    for (const [key, count] of this.repeatedFailures) {
      if (count > REPEATED_FAILURE_THRESHOLD) {
        recommendations.push(`Repeated failure: ${key} (${count} times) - needs investigation`);
      }
    }

    const incomplete = this.incompleteSteps();
    if (incomplete.length > 0) {
      recommendations.push(`Retry incomplete steps: ${incomplete.slice(0, 3).join(', ')}`);
    }

    return {
      totalPagesScanned: this.pagesScanned.size,
      totalDataSourcesChecked: this.dataSourcesChecked.size,
      totalEmailsFound: this.emailsFound.size,
      totalFailures: this.failures.length,
      slowOperations: [...this.slowOperations],
      repeatedFailures: Object.fromEntries(this.repeatedFailures),
      anomalies: [...this.anomalies],
      recommendations
    };
  }

  // Entries go out as copies; a written entry never changes.

  page(name: string): PageScanResult | undefined {
    const result = this.pagesScanned.get(name);
    return result && copyPage(result);
  }

  dataSource(name: string): SourceCheckResult | undefined {
    const check = this.dataSourcesChecked.get(name);
    return check && copySource(check);
  }

  emails(): string[] {
    return [...this.emailsFound].sort();
  }

  failureLog(): FailureEvent[] {
    return [...this.failures];
  }

  toJSON(): VerificationSummary {
    return {
      baseUrl: this.baseUrl,
      status: this.completionStatus(),
      completed: this.completed,
      startedAt: this.startedAt.toISOString(),
      finishedAt: this.finishedAt?.toISOString(),
      pages: Object.fromEntries([...this.pagesScanned].map(([name, result]) => [name, copyPage(result)])),
      dataSources: Object.fromEntries([...this.dataSourcesChecked].map(([name, check]) => [name, copySource(check)])),
      emails: this.emails(),
      emailsCleaned: this.emailsCleaned,
      noEmailReason: this.noEmailReason,
      internalLinks: [...this.internalLinks],
      incompleteSteps: this.incompleteSteps(),
      failedSteps: this.failedSteps(),
      diagnostics: this.diagnostics()
    };
  }

  /**
   * Render the plain-text verification report and seal the record.
   */
  report(): string {
    this.sealed = true;
    const end = this.finishedAt ?? this.now();
    const status = this.completionStatus();
    const lines: string[] = [];

    const section = (title: string) => {
      lines.push(RULE, title, RULE);
    };

    section('EMAIL DISCOVERY VERIFICATION REPORT');
    lines.push(`URL: ${this.baseUrl}`);
    lines.push(`Start Time: ${this.startedAt.toISOString()}`);
    lines.push(`End Time: ${end.toISOString()}`);
    lines.push(`Duration: ${formatTime(end.getTime() - this.startedAt.getTime())}`);
    lines.push('');

    section('OVERALL STATUS');
    lines.push(`Status: ${status}`);
    lines.push('');

    section('1. WEBSITE SCAN VERIFICATION');
    lines.push(`Internal Links Checked: ${this.internalLinksChecked ? `YES (${this.internalLinks.length})` : 'NO'}`);
    lines.push('Target Pages:');
    for (const page of REQUIRED_PAGES) {
      const result = this.pagesScanned.get(page);
      lines.push(`  ${result ? '✓' : '✗'} ${page}: ${result ? result.status.toUpperCase() : 'NOT CHECKED'}`);
    }
    lines.push('');

    section('2. DATA SOURCES VERIFICATION');
    for (const source of DATA_SOURCES) {
      const check = this.dataSourcesChecked.get(source);
      const found = check && check.emailsFound > 0 ? ` (${check.emailsFound} emails found)` : '';
      lines.push(`  ${check ? '✓' : '✗'} ${source}: ${check ? check.status.toUpperCase() : 'NOT CHECKED'}${found}`);
    }
    lines.push('');

    section('3. RESULTS VERIFICATION');
    lines.push(`Emails Found: ${this.emailsFound.size}`);
    if (this.emailsFound.size > 0) {
      lines.push(`Emails Cleaned/Formatted: ${this.emailsCleaned ? 'YES' : 'NO'}`);
      for (const email of this.emails()) {
        lines.push(`  - ${email}`);
      }
    } else {
      lines.push(`No Email Reason Provided: ${this.noEmailReason !== undefined ? 'YES' : 'NO'}`);
      if (this.noEmailReason !== undefined) {
        lines.push(`  Reason: ${this.noEmailReason}`);
      }
    }
    lines.push('');

    const failed = this.failedSteps();
    if (failed.length > 0) {
      section('4. FAILURES TRACKED');
      for (const failure of failed) {
        lines.push(`  ✗ ${failure.type}: ${failure.name}`);
        lines.push(`    Reason: ${failure.reason}`);
        if (failure.url) {
          lines.push(`    URL: ${failure.url}`);
        }
      }
      lines.push('');
    }

    const incomplete = this.incompleteSteps();
    if (incomplete.length > 0) {
      section('5. INCOMPLETE STEPS');
      for (const step of incomplete) {
        lines.push(`  ⚠ ${step}`);
      }
      lines.push('');
    }

    const diagnostics = this.diagnostics();
    section('6. DIAGNOSTICS');
    lines.push(`Total Pages Scanned: ${diagnostics.totalPagesScanned}`);
    lines.push(`Total Data Sources Checked: ${diagnostics.totalDataSourcesChecked}`);
    lines.push(`Total Emails Found: ${diagnostics.totalEmailsFound}`);
    lines.push(`Total Failures: ${diagnostics.totalFailures}`);
    lines.push(`Slow Operations: ${diagnostics.slowOperations.length}`);
    for (const [key, count] of Object.entries(diagnostics.repeatedFailures)) {
      lines.push(`  - ${key}: ${count} times`);
    }
    for (const anomaly of diagnostics.anomalies) {
      lines.push(`  ! ${anomaly}`);
    }
    if (diagnostics.recommendations.length > 0) {
      lines.push('Recommendations:');
      for (const recommendation of diagnostics.recommendations) {
        lines.push(`  → ${recommendation}`);
      }
    }
    lines.push('');

    section('FINAL SUMMARY');
    lines.push(`Status: ${status}`);
    lines.push(`Emails Found: ${this.emailsFound.size}`);
    lines.push(`Pages Scanned: ${countRequired(this.pagesScanned, REQUIRED_PAGES)}/${REQUIRED_PAGES.length}`);
    lines.push(`Data Sources Checked: ${countRequired(this.dataSourcesChecked, DATA_SOURCES)}/${DATA_SOURCES.length}`);
    lines.push(`Failures: ${this.failures.length}`);
    lines.push(RULE);

    return lines.join('\n');
  }

  private trackFailure(operation: string, reason: FailureReason): void {
    this.failures.push({ operation, reason, at: this.now() });
    const key = `${operation}:${reason}`;
    this.repeatedFailures.set(key, (this.repeatedFailures.get(key) ?? 0) + 1);
  }

  private noteAnomaly(message: string): void {
    this.anomalies.push(message);
    log.debug(`${this.baseUrl}: ${message}`);
  }

  private writable(what: string): boolean {
    if (this.sealed) {
      log.warn(`${this.baseUrl}: record already reported, dropping write to ${what}`);
      return false;
    }
    return true;
  }
}

function isRequiredPage(name: string): boolean {
  return REQUIRED_PAGES.some(page => page === name);
}

function isRequiredSource(name: string): boolean {
  return DATA_SOURCES.some(source => source === name);
}

function countRequired(entries: ReadonlyMap<string, unknown>, required: readonly string[]): number {
  return required.filter(name => entries.has(name)).length;
}

function copyPage(result: PageScanResult): PageScanResult {
  return { ...result, recordedAt: new Date(result.recordedAt) };
}

function copySource(check: SourceCheckResult): SourceCheckResult {
  return { ...check, recordedAt: new Date(check.recordedAt) };
}
