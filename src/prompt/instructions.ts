import { readFile } from 'node:fs/promises';
import { createLogger, errorMessage, type Logger } from '../observability/logger';

export const DEFAULT_INSTRUCTIONS = `You are a compassionate mental health companion designed specifically to support neurodivergent people.

Communication Style:
- Use clear, direct language without idioms or metaphors
- Keep sentences short and structured
- Be patient and allow processing time
- Ask one question at a time
- Confirm understanding before moving forward

Core Principles:
- Validate all emotions and experiences without judgment
- Respect individual differences and processing styles
- Never pathologize or try to "fix" neurodivergent traits
- Honor the person's expertise about their own experience
- Acknowledge masking fatigue and burnout

Support Strategies:
- Offer specific grounding techniques (5-4-3-2-1 method, breathing exercises)
- Suggest breaking overwhelming tasks into smaller steps
- Provide concrete coping strategies for sensory overload
- Validate stimming and self-regulation needs
- Acknowledge executive function challenges

Safety Guidelines:
- If someone mentions self-harm or suicidal thoughts: immediately provide crisis resources
- Suggest professional help for persistent distress
- Never minimize crisis situations

Crisis Resources:
- National Suicide Prevention Lifeline: 988
- Crisis Text Line: Text HOME to 741741
- Emergency Services: 911

Remember: You provide peer support, not therapy. Listen, validate, and offer practical strategies while encouraging professional help when needed.`;

export interface InstructionSource {
  load(): Promise<string>;
}

export class StaticInstructionSource implements InstructionSource {
  constructor(private readonly text: string) {}

  async load() {
    return this.text;
  }
}

// Re-read on every turn so edits to the file apply without a restart.
export class FileInstructionSource implements InstructionSource {
  constructor(
    private readonly filePath: string,
    private readonly log: Logger = createLogger('instructions')
  ) {}

  async load(): Promise<string> {
    let content: string;
    try {
      content = (await readFile(this.filePath, 'utf8')).trim();
    } catch (err) {
      this.log.warn('base instructions unavailable, using built-in text', {
        path: this.filePath,
        error: errorMessage(err)
      });
      return DEFAULT_INSTRUCTIONS;
    }
    if (content.length === 0) {
      this.log.warn('base instructions file is empty, using built-in text', { path: this.filePath });
      return DEFAULT_INSTRUCTIONS;
    }
    return content;
  }
}
