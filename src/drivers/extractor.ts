/**
 * Default extraction capability
 *
 * Reads a rendered page with cheerio and fills a FieldBag. Each data source
 * is inspected on its own and reported in `sources`, so one unreadable source
 * shows up as a failed check instead of failing the whole page.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { FieldBagSchema } from '../types/field-bag.js';
import type { DataSourceName, Extractor, FieldBag, MessagingLinks, RenderedPage, SourceReport } from '../types/field-bag.js';
import { cleanEmails, findEmails, findPhones, SOCIAL_DOMAINS, unique } from '../core/contacts.js';
import { visibleText } from '../core/escalation.js';
import { errorMessage } from '../utils/error-handlers.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('extractor');

const IndustryKeywordsSchema = z.record(z.string(), z.array(z.string()));

type IndustryKeywords = z.infer<typeof IndustryKeywordsSchema>;

const PRODUCT_KEYWORDS = [
  'product', 'service', 'offer', 'solution', 'package', 'pricing', 'price',
  'buy', 'purchase', 'order', 'features', 'plans', 'subscription'
];

const BLOG_KEYWORDS = ['blog', 'article', 'news'];

const MESSAGING_PATTERNS: ReadonlyArray<[keyof MessagingLinks, RegExp]> = [
  ['whatsapp', /https?:\/\/(?:wa\.me|api\.whatsapp\.com|chat\.whatsapp\.com)\/[^\s"'<>]+/i],
  ['telegram', /https?:\/\/(?:t\.me|telegram\.me)\/[^\s"'<>]+/i],
  ['signal', /https?:\/\/signal\.(?:me|group)\/[^\s"'<>]+/i],
  ['discord', /https?:\/\/(?:discord\.gg|discord\.com\/invite)\/[^\s"'<>]+/i]
];

interface SourceScan {
  emails: string[];
}

export class HtmlExtractor implements Extractor {
  private industryKeywords: IndustryKeywords | null = null;

  constructor(private readonly keywordsPath: string = join(process.cwd(), 'db', 'industry-keywords.json')) {}

  async extract(page: RenderedPage): Promise<FieldBag> {
    const $ = cheerio.load(page.html);
    const text = visibleText(page.html);
    const lowerHtml = page.html.toLowerCase();
    const sources: SourceReport[] = [];
    const emails: string[] = [];

    const scan = (source: DataSourceName, run: () => SourceScan) => {
      try {
        const found = cleanEmails(run().emails);
        emails.push(...found);
        sources.push({ source, checked: true, emailsFound: found.length });
      } catch (error) {
        log.debug(`${source} unreadable on ${page.url}: ${errorMessage(error)}`);
        sources.push({ source, checked: false, emailsFound: 0, error: errorMessage(error) });
      }
    };

    scan('visible_text', () => ({ emails: findEmails(text) }));
    scan('dom_text', () => ({ emails: findEmails(page.domText ?? $.root().text()) }));
    scan('inline_script', () => ({ emails: findEmails(inlineScripts($)) }));
    scan('meta_tags', () => ({ emails: findEmails(metaContent($)) }));
    scan('structured_data', () => ({ emails: structuredDataEmails($) }));
    scan('mailto_links', () => ({ emails: mailtoEmails($) }));
    scan('forms', () => ({ emails: formEmails($) }));

    // Profile and share links sometimes carry an address in their target.
    let socialLinks: string[] = [];
    scan('social_links', () => {
      const links = extractSocialLinks(page.html);
      const found = links.flatMap(link => findEmails(decodeURIComponent(link)));
      socialLinks = links;
      return { emails: found };
    });

    const fields = {
      emails: cleanEmails(emails),
      phones: findPhones(text),
      addresses: extractAddresses($),
      socialLinks,
      messagingLinks: extractMessagingLinks(page.html),
      metadata: {
        title: $('title').first().text().trim().slice(0, 200),
        metaDescription: metaValue($, 'name', 'description'),
        ogTitle: metaValue($, 'property', 'og:title'),
        ogDescription: metaValue($, 'property', 'og:description'),
        ogImage: metaValue($, 'property', 'og:image')
      },
      industryGuess: inferIndustry(lowerHtml, await this.loadIndustryKeywords()),
      hasContactForm: detectContactForm($),
      wordCount: text ? text.split(' ').length : 0,
      hasBlog: detectBlog($, page.finalUrl, lowerHtml),
      hasProductsOrServices: PRODUCT_KEYWORDS.some(keyword => lowerHtml.includes(keyword)),
      sources
    };

    return FieldBagSchema.parse(fields);
  }

  private async loadIndustryKeywords(): Promise<IndustryKeywords> {
    if (!this.industryKeywords) {
      const raw = await readFile(this.keywordsPath, 'utf-8');
      this.industryKeywords = IndustryKeywordsSchema.parse(JSON.parse(raw));
    }
    return this.industryKeywords;
  }
}

function inlineScripts($: CheerioAPI): string {
  return $('script')
    .filter((_, el) => $(el).attr('type') !== 'application/ld+json')
    .map((_, el) => $(el).html() ?? '')
    .get()
    .join('\n');
}

function metaContent($: CheerioAPI): string {
  return $('meta[content]')
    .map((_, el) => $(el).attr('content') ?? '')
    .get()
    .join('\n');
}

function metaValue($: CheerioAPI, attribute: 'name' | 'property', key: string): string {
  return ($(`meta[${attribute}="${key}"]`).attr('content') ?? '').trim().slice(0, 300);
}

/**
 * Emails from JSON-LD blocks: every "email" field, wherever it is nested.
 * A block that is not valid JSON makes the whole source unreadable.
 */
function structuredDataEmails($: CheerioAPI): string[] {
  const emails: string[] = [];

  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(walk);
    } else if (value !== null && typeof value === 'object') {
      for (const [key, nested] of Object.entries(value)) {
        if (key.toLowerCase() === 'email' && typeof nested === 'string') {
          emails.push(nested.replace(/^mailto:/i, ''));
        } else {
          walk(nested);
        }
      }
    }
  };

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).html();
    if (raw && raw.trim()) {
      walk(JSON.parse(raw));
    }
  });

  return emails;
}

function mailtoEmails($: CheerioAPI): string[] {
  return $('a[href^="mailto:"], a[href^="MAILTO:"]')
    .map((_, el) => {
      const href = $(el).attr('href') ?? '';
      return decodeURIComponent(href.replace(/^mailto:/i, '').split('?')[0]);
    })
    .get();
}

function formEmails($: CheerioAPI): string[] {
  const found: string[] = [];
  $('form').each((_, form) => {
    found.push(...findEmails($(form).attr('action') ?? ''));
    $(form).find('input[type="hidden"], input[type="email"]').each((__, input) => {
      found.push(...findEmails($(input).attr('value') ?? ''));
    });
  });
  return found;
}

function detectContactForm($: CheerioAPI): boolean {
  return $('form').toArray().some(form => {
    const $form = $(form);
    const hasEmailField = $form.find('input[type="email"], input[name*="email" i]').length > 0;
    const hasMessage = $form.find('textarea').length > 0;
    const label = `${$form.attr('id') ?? ''} ${$form.attr('class') ?? ''} ${$form.attr('action') ?? ''}`.toLowerCase();
    return (hasEmailField && hasMessage) || label.includes('contact');
  });
}

function extractSocialLinks(html: string): string[] {
  const links: string[] = [];
  for (const domain of SOCIAL_DOMAINS) {
    const pattern = new RegExp(`https?://(?:www\\.)?${domain.replace('.', '\\.')}/[^\\s"'<>]+`, 'gi');
    links.push(...(html.match(pattern) ?? []));
  }
  return unique(links);
}

function extractMessagingLinks(html: string): MessagingLinks {
  const links: MessagingLinks = {};
  for (const [key, pattern] of MESSAGING_PATTERNS) {
    const match = html.match(pattern);
    if (match) {
      links[key] = match[0];
    }
  }
  return links;
}

function extractAddresses($: CheerioAPI): string[] {
  const addresses = $('address, [itemprop="address"]')
    .map((_, el) => $(el).text().replace(/\s+/g, ' ').trim())
    .get()
    .filter(address => address.length > 0);
  return unique(addresses);
}

function detectBlog($: CheerioAPI, url: string, lowerHtml: string): boolean {
  const lowerUrl = url.toLowerCase();
  if (BLOG_KEYWORDS.some(keyword => lowerUrl.includes(keyword))) return true;
  if ($('a[href*="blog"], a[href*="news"], a[href*="article"]').length > 0) return true;
  return BLOG_KEYWORDS.some(keyword => lowerHtml.includes(keyword));
}

export function inferIndustry(lowerHtml: string, keywords: IndustryKeywords): string {
  let best = 'General';
  let bestScore = 0;

  for (const [industry, words] of Object.entries(keywords)) {
    const score = words.filter(word => lowerHtml.includes(word)).length;
    if (score > bestScore) {
      best = industry;
      bestScore = score;
    }
  }

  return best;
}
