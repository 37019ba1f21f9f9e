import { CRISIS_PHRASES } from './keywords';

// Substring match on purpose: "die" inside a longer word still counts. A missed crisis costs more than a false alarm.
export function isCrisis(text: string, phrases: readonly string[] = CRISIS_PHRASES): boolean {
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase));
}

export function matchedCrisisPhrases(text: string, phrases: readonly string[] = CRISIS_PHRASES): string[] {
  const lower = text.toLowerCase();
  return phrases.filter((phrase) => lower.includes(phrase));
}
