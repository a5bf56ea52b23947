import { emptyFieldBag } from '../types/field-bag.js';
import type { FieldBag } from '../types/field-bag.js';
import { unique } from './contacts.js';

/**
 * Combine the field bags of one site's pages. The first bag is the homepage,
 * so page-level facts (metadata, industry) come from it; lists are unioned
 * and flags are OR-ed.
 */
export function mergeFieldBags(bags: readonly FieldBag[]): FieldBag {
  if (bags.length === 0) {
    return emptyFieldBag();
  }

  const [first] = bags;
  const merged: FieldBag = {
    ...emptyFieldBag(),
    metadata: { ...first.metadata },
    industryGuess: first.industryGuess
  };

  for (const bag of bags) {
    merged.emails = unique([...merged.emails, ...bag.emails]);
    merged.phones = unique([...merged.phones, ...bag.phones]);
    merged.addresses = unique([...merged.addresses, ...bag.addresses]);
    merged.socialLinks = unique([...merged.socialLinks, ...bag.socialLinks]);
    merged.messagingLinks = { ...bag.messagingLinks, ...merged.messagingLinks };
    merged.hasContactForm ||= bag.hasContactForm;
    merged.hasBlog ||= bag.hasBlog;
    merged.hasProductsOrServices ||= bag.hasProductsOrServices;
    merged.wordCount += bag.wordCount;
    merged.sources = [...merged.sources, ...bag.sources];
  }

  if (merged.industryGuess === 'General') {
    merged.industryGuess = bags.find(bag => bag.industryGuess !== 'General')?.industryGuess ?? 'General';
  }

  return merged;
}
