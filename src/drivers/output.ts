/**
 * Output driver
 *
 * - Flattens site results into CSV rows (papaparse)
 * - Writes the JSON results, the CSV and one verification report per site
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';
import { extractDomain } from '../core/utils/url-utils.js';
import type { JobResult, SiteResult } from '../types/job.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('output');

export const CSV_COLUMNS = [
  'url',
  'status',
  'method',
  'confidence',
  'emails',
  'phones',
  'social_links',
  'whatsapp',
  'telegram',
  'title',
  'industry',
  'has_contact_form',
  'word_count'
] as const;

export type CsvRow = Record<typeof CSV_COLUMNS[number], string | number>;

export interface WrittenFiles {
  json: string;
  csv: string;
  reports: string[];
}

function statusOf(result: SiteResult): string {
  switch (result.outcome.kind) {
    case 'http-success':
    case 'browser-success':
      return 'success';
    case 'failed':
      return `failed: ${result.outcome.reason}`;
    case 'skipped':
      return 'skipped';
  }
}

export function toCsvRow(result: SiteResult): CsvRow {
  const fields = result.fields;
  return {
    url: result.url,
    status: statusOf(result),
    method: result.method,
    confidence: result.confidence,
    emails: fields?.emails.join('; ') ?? '',
    phones: fields?.phones.join('; ') ?? '',
    social_links: fields?.socialLinks.join('; ') ?? '',
    whatsapp: fields?.messagingLinks.whatsapp ?? '',
    telegram: fields?.messagingLinks.telegram ?? '',
    title: fields?.metadata.title ?? '',
    industry: fields?.industryGuess ?? '',
    has_contact_form: fields?.hasContactForm ? 'yes' : 'no',
    word_count: fields?.wordCount ?? 0
  };
}

/**
 * CSV of the sites that meet the job's confidence threshold.
 */
export function toCsv(results: readonly SiteResult[]): string {
  const rows = results.filter(result => result.meetsConfidence).map(toCsvRow);
  return Papa.unparse({ fields: [...CSV_COLUMNS], data: rows.map(row => CSV_COLUMNS.map(column => row[column])) });
}

/**
 * `verification_<domain>[_<path>].txt`, so sites on one host keep apart.
 */
export function reportFileName(url: string): string {
  const domain = safeName(extractDomain(url));
  const slug = safeName(pathOf(url).replace(/^\/+|\/+$/g, ''));
  return `verification_${domain || 'unknown'}${slug ? `_${slug}` : ''}.txt`;
}

function safeName(value: string): string {
  return value.replace(/[^a-z0-9.-]+/gi, '_').replace(/^_+|_+$/g, '');
}

function pathOf(url: string): string {
  try {
    return new URL(/^https?:\/\//i.test(url) ? url : `https://${url}`).pathname;
  } catch {
    return '';
  }
}

function uniqueName(name: string, used: Set<string>): string {
  let candidate = name;
  for (let n = 2; used.has(candidate); n++) {
    candidate = name.replace(/\.txt$/, `_${n}.txt`);
  }
  used.add(candidate);
  return candidate;
}

export async function writeJobOutput(job: JobResult, outputDir: string): Promise<WrittenFiles> {
  await mkdir(outputDir, { recursive: true });

  const json = join(outputDir, 'results.json');
  await writeFile(json, JSON.stringify({
    summary: job.summary,
    results: job.results,
    verification: job.verification
  }, null, 2));

  const csv = join(outputDir, 'results.csv');
  await writeFile(csv, toCsv(job.results));

  const reports: string[] = [];
  const used = new Set<string>();
  for (const [url, report] of job.reports) {
    const path = join(outputDir, uniqueName(reportFileName(url), used));
    await writeFile(path, report);
    reports.push(path);
  }

  log.normal(`Wrote ${json}, ${csv} and ${reports.length} verification report(s)`);
  return { json, csv, reports };
}
