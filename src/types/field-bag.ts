import { z } from 'zod';

export const DATA_SOURCES = [
  'visible_text',
  'dom_text',
  'inline_script',
  'meta_tags',
  'structured_data',
  'mailto_links',
  'forms',
  'social_links'
] as const;

export type DataSourceName = typeof DATA_SOURCES[number];

export const SourceReportSchema = z.object({
  source: z.string(),
  checked: z.boolean(),
  emailsFound: z.number().int().nonnegative(),
  error: z.string().optional(),
});

export type SourceReport = z.infer<typeof SourceReportSchema>;

export const MessagingLinksSchema = z.object({
  whatsapp: z.string().optional(),
  telegram: z.string().optional(),
  signal: z.string().optional(),
  discord: z.string().optional(),
});

export type MessagingLinks = z.infer<typeof MessagingLinksSchema>;

export const PageMetadataSchema = z.object({
  title: z.string().default(''),
  metaDescription: z.string().default(''),
  ogTitle: z.string().default(''),
  ogDescription: z.string().default(''),
  ogImage: z.string().default(''),
});

export type PageMetadata = z.infer<typeof PageMetadataSchema>;

export const FieldBagSchema = z.object({
  emails: z.array(z.string()),
  phones: z.array(z.string()),
  addresses: z.array(z.string()),
  socialLinks: z.array(z.string()),
  messagingLinks: MessagingLinksSchema,
  metadata: PageMetadataSchema,
  industryGuess: z.string(),
  hasContactForm: z.boolean(),
  wordCount: z.number().int().nonnegative(),
  hasBlog: z.boolean(),
  hasProductsOrServices: z.boolean(),
  sources: z.array(SourceReportSchema).default([]),
});

export type FieldBag = z.infer<typeof FieldBagSchema>;

/**
 * What a render backend hands to the extraction capability.
 * Browser renders carry a text snapshot of the live DOM taken before the
 * session goes back to the pool.
 */
export interface RenderedPage {
  url: string;
  finalUrl: string;
  html: string;
  method: 'http' | 'browser';
  domText?: string;
}

/**
 * Extraction capability. Throwing is reported as an ExtractionFault.
 */
export interface Extractor {
  extract(page: RenderedPage): Promise<FieldBag>;
}

export function emptyFieldBag(): FieldBag {
  return {
    emails: [],
    phones: [],
    addresses: [],
    socialLinks: [],
    messagingLinks: {},
    metadata: { title: '', metaDescription: '', ogTitle: '', ogDescription: '', ogImage: '' },
    industryGuess: 'General',
    hasContactForm: false,
    wordCount: 0,
    hasBlog: false,
    hasProductsOrServices: false,
    sources: [],
  };
}
