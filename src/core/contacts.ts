/**
 * Pattern helpers shared by the extractor and the job runner
 */

import type { FieldBag } from '../types/field-bag.js';

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_PATTERN = /\+?\d{1,3}[-.\s]?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;
const ASSET_SUFFIX = /\.(png|jpe?g|gif|webp|svg|css|js|ico)$/i;

export const SOCIAL_DOMAINS = [
  'facebook.com',
  'instagram.com',
  'twitter.com',
  'x.com',
  'tiktok.com',
  'linkedin.com',
  'youtube.com',
  'pinterest.com',
  'snapchat.com'
] as const;

export function findEmails(text: string): string[] {
  return text.match(EMAIL_PATTERN) ?? [];
}

export function findPhones(text: string): string[] {
  return unique((text.match(PHONE_PATTERN) ?? []).map(phone => phone.trim()));
}

/**
 * Normalize raw email matches: lowercase, strip URL-encoding leftovers and
 * trailing punctuation, drop asset filenames such as logo@2x.png, dedupe.
 */
export function cleanEmails(raw: Iterable<string>): string[] {
  const cleaned = new Set<string>();

  for (const candidate of raw) {
    let email = candidate.trim().toLowerCase();
    email = email.replace(/^(mailto:|%20|u003e)/, '');
    email = email.replace(/[.,;:]+$/, '');

    if (!email.includes('@') || ASSET_SUFFIX.test(email)) continue;
    const [local, domain] = email.split('@');
    if (!local || !domain || !domain.includes('.')) continue;

    cleaned.add(email);
  }

  return [...cleaned].sort();
}

/**
 * Contact confidence between 0 and 1: an email weighs most, then a phone,
 * then social links and a contact form.
 */
export function scoreConfidence(fields: Pick<FieldBag, 'emails' | 'phones' | 'socialLinks' | 'hasContactForm'>): number {
  let score = 0;
  if (fields.emails.length > 0) score += 0.5;
  if (fields.phones.length > 0) score += 0.2;
  if (fields.socialLinks.length > 0) score += 0.15;
  if (fields.hasContactForm) score += 0.15;
  return Math.min(1, Math.round(score * 100) / 100);
}

export function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}
