import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

/**
 * Markers of client-side rendering frameworks, matched case-insensitively
 * against the raw HTML.
 */
export const FRAMEWORK_MARKERS = [
  'react',
  'angular',
  'vue.js',
  'next.js',
  '__next_data__',
  'ng-app',
  'v-app',
  'data-reactroot',
  'data-react-helmet'
] as const;

export const DEFAULT_MIN_TEXT_LENGTH = 200;

export type EscalationDecision =
  | { escalate: false; textLength: number }
  | { escalate: true; reason: string; textLength: number };

/**
 * Text a reader would see: body text without scripts, styles or templates,
 * whitespace collapsed.
 */
export function visibleText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template, svg').remove();
  const root: cheerio.Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root();
  return root.text().replace(/\s+/g, ' ').trim();
}

/**
 * Decide whether a page fetched without script execution needs a full render.
 */
export function decideEscalation(html: string, minTextLength = DEFAULT_MIN_TEXT_LENGTH): EscalationDecision {
  if (!html.trim()) {
    return { escalate: true, reason: 'empty document', textLength: 0 };
  }

  const lower = html.toLowerCase();
  const marker = FRAMEWORK_MARKERS.find(candidate => lower.includes(candidate));
  const textLength = visibleText(html).length;

  if (marker) {
    return { escalate: true, reason: `framework marker '${marker}'`, textLength };
  }
  if (textLength < minTextLength) {
    return { escalate: true, reason: `visible text ${textLength} < ${minTextLength} chars`, textLength };
  }
  return { escalate: false, textLength };
}
