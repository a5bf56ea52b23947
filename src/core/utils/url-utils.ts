/**
 * URL utility functions
 */

/**
 * Social media and platform domains that are never fetched.
 */
export const BLOCKED_DOMAINS = [
  'facebook.com', 'fb.com', 'instagram.com', 'twitter.com', 'x.com',
  'linkedin.com', 'youtube.com', 'tiktok.com', 'snapchat.com',
  'pinterest.com', 'reddit.com', 'tumblr.com', 'whatsapp.com',
  'telegram.org', 't.me', 'discord.com', 'discord.gg',
  'twitch.tv', 'vimeo.com', 'flickr.com', 'medium.com'
] as const;

export type UrlValidation =
  | { valid: true; url: URL }
  | { valid: false; reason: string };

/**
 * Extract domain from a URL or domain string
 * @returns Clean domain (e.g., "example.com")
 */
export function extractDomain(urlOrDomain: string): string {
  try {
    if (!urlOrDomain.includes('://') && !urlOrDomain.includes('/')) {
      return urlOrDomain.toLowerCase();
    }

    const url = new URL(urlOrDomain.startsWith('http') ? urlOrDomain : `https://${urlOrDomain}`);
    return url.hostname.replace(/^www\./, '').toLowerCase();
  } catch {
    return urlOrDomain
      .replace(/^https?:\/\//, '')
      .replace(/^www\./, '')
      .split('/')[0]
      .toLowerCase();
  }
}

/**
 * True when the host is a denylisted platform or one of its subdomains.
 */
export function isBlockedDomain(hostname: string): boolean {
  const host = hostname.toLowerCase().replace(/^www\./, '');
  return BLOCKED_DOMAINS.some(domain => host === domain || host.endsWith(`.${domain}`));
}

/**
 * Policy check run before any network attempt.
 */
export function validateUrl(raw: string): UrlValidation {
  const trimmed = raw.trim();

  if (!/^https?:\/\//i.test(trimmed)) {
    return { valid: false, reason: 'URL must start with http:// or https://' };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return { valid: false, reason: 'Invalid URL format' };
  }

  if (isBlockedDomain(url.hostname)) {
    return { valid: false, reason: `Social media/platform URLs are not supported (${extractDomain(url.hostname)})` };
  }

  if (!url.hostname.includes('.')) {
    return { valid: false, reason: 'Invalid URL format (missing domain)' };
  }

  return { valid: true, url };
}

/**
 * Key under which a URL is recognised as the same page within a run: trimmed,
 * host lowercased, fragment and a lone trailing slash dropped.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  try {
    const url = new URL(trimmed);
    url.hash = '';
    const text = url.toString();
    return url.pathname === '/' && !url.search ? text.replace(/\/$/, '') : text;
  } catch {
    return trimmed;
  }
}

/**
 * Build the URL of a guessed sub-page (e.g. /contact) on the same origin.
 */
export function buildSubpageUrl(baseUrl: string, path: string): string {
  const base = new URL(baseUrl);
  return `${base.origin}/${path.replace(/^\/+/, '')}`;
}
