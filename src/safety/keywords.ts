// Trigger tables. Every entry is matched as a lower-case substring, so keep them lower-case.

export const CRISIS_PHRASES: readonly string[] = [
  'suicide',
  'kill myself',
  'end my life',
  'want to die',
  'better off dead',
  'self harm',
  'hurt myself',
  'cut myself',
  'overdose',
  'jump off',
  'no point living',
  'worthless',
  'hopeless',
  "can't go on"
];

export const NEED_CATEGORIES = ['sensory', 'social', 'executive', 'meltdown', 'identity'] as const;

export type NeedCategory = (typeof NEED_CATEGORIES)[number];

export const NEED_KEYWORDS: Readonly<Record<NeedCategory, readonly string[]>> = {
  sensory: ['overwhelmed', 'too loud', 'too bright', 'sensory overload', 'stimming'],
  social: ['masking', 'social anxiety', "don't understand people", 'social cues'],
  executive: ["can't focus", 'procrastination', 'executive function', 'time management'],
  meltdown: ['meltdown', 'shutdown', 'overstimulated', "can't cope"],
  identity: ['imposter syndrome', "don't fit in", 'different', 'weird']
};
