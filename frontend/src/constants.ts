export const EXAMPLE_PROMPTS = [
  'My executive function is terrible today and I can\'t focus',
  'I\'m struggling with social situations and feel anxious',
  'How do I manage sensory overload when I\'m out in public?',
  'I had a meltdown earlier and I\'m feeling ashamed about it',
  'I feel like I don\'t fit in anywhere',
  'I\'m tired of masking all the time and feeling exhausted'
];

export const CRISIS_RESOURCES = [
  { label: 'National Suicide Prevention Lifeline', value: '988' },
  { label: 'Crisis Text Line', value: 'Text HOME to 741741' },
  { label: 'Emergency Services', value: '911' }
];

export const UI_MAX_CHARS = 1000;
