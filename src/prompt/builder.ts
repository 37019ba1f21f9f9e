import type { AssistantLabel } from '../config';
import type { Turn } from '../core/context';
import type { NeedCategory } from '../safety/keywords';

export type BuildPromptInput = {
  baseInstructions: string;
  needs: ReadonlySet<NeedCategory> | readonly NeedCategory[];
  history: readonly Turn[];
  currentText: string;
  maxHistoryTurns: number;
  assistantLabel?: AssistantLabel;
};

export function needHint(needs: readonly NeedCategory[]): string {
  return `The user may be experiencing challenges related to: ${needs.join(', ')}. Provide specific, practical support for these areas.`;
}

export function trailingWindow(history: readonly Turn[], maxTurns: number): readonly Turn[] {
  // slice(-0) would return everything
  if (maxTurns <= 0) return [];
  return history.slice(-maxTurns);
}

function isComplete(turn: Turn | null | undefined): turn is Turn {
  return Boolean(turn && turn.userText && turn.botText);
}

export function buildPrompt(input: BuildPromptInput): string {
  const label = input.assistantLabel ?? 'Assistant';
  const needs = Array.from(input.needs);

  let prompt = input.baseInstructions;
  if (needs.length > 0) {
    prompt += `\n\n${needHint(needs)}`;
  }
  prompt += '\n\n';

  // incomplete turns (rejected input) never take a window slot
  const complete = input.history.filter(isComplete);
  for (const turn of trailingWindow(complete, input.maxHistoryTurns)) {
    prompt += `User: ${turn.userText}\n${label}: ${turn.botText}\n`;
  }

  prompt += `User: ${input.currentText}\n${label}:`;
  return prompt;
}
