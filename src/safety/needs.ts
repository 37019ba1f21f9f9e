import { NEED_CATEGORIES, NEED_KEYWORDS, type NeedCategory } from './keywords';

/**
 * Support topics mentioned in one message. Categories come back in table order;
 * a message can hit several at once.
 */
export function detectNeeds(
  text: string,
  table: Readonly<Record<NeedCategory, readonly string[]>> = NEED_KEYWORDS
): Set<NeedCategory> {
  const lower = text.toLowerCase();
  const found = new Set<NeedCategory>();
  for (const category of NEED_CATEGORIES) {
    if (table[category].some((keyword) => lower.includes(keyword))) {
      found.add(category);
    }
  }
  return found;
}
