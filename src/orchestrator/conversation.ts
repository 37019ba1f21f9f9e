import type { PipelineSettings } from '../config';
import type { Turn } from '../core/context';
import { TurnFSM, TurnState, isTerminal, type TerminalState } from '../core/fsm';
import { cleanResponse } from '../llm/sanitizer';
import type { GenerationError, GenerationErrorKind, GenerationProvider, GenerationRequest } from '../llm/types';
import { createLogger, errorMessage, type Logger } from '../observability/logger';
import { buildPrompt } from '../prompt/builder';
import type { InstructionSource } from '../prompt/instructions';
import { matchedCrisisPhrases } from '../safety/crisis';
import { CRISIS_PHRASES, NEED_KEYWORDS, type NeedCategory } from '../safety/keywords';
import { detectNeeds } from '../safety/needs';
import { validateInput, type RejectionReason } from '../safety/validator';
import {
  CANCELLED_REPLY,
  CRISIS_REPLY,
  EMPTY_INPUT_REPLY,
  PROCESS_ERROR_REPLY,
  TIMEOUT_REPLY,
  UNEXPECTED_ERROR_REPLY,
  tooLongReply
} from './replies';

export type FailureKind = GenerationErrorKind | 'unexpected';

export type TurnResult = {
  state: TerminalState;
  reply: string;
  needs: NeedCategory[];
  rejection?: RejectionReason;
  failure?: FailureKind;
  // what the caller should append to its history
  turn: Turn;
  trail: TurnState[];
};

export type OrchestratorDeps = {
  settings: PipelineSettings;
  generator: GenerationProvider;
  instructions: InstructionSource;
  logger?: Logger;
  crisisPhrases?: readonly string[];
  needKeywords?: Readonly<Record<NeedCategory, readonly string[]>>;
};

function failureReply(kind: FailureKind): string {
  switch (kind) {
    case 'timeout':
      return TIMEOUT_REPLY;
    case 'process':
      return PROCESS_ERROR_REPLY;
    case 'cancelled':
      return CANCELLED_REPLY;
    case 'unexpected':
      return UNEXPECTED_ERROR_REPLY;
  }
}

function describeFailure(error: GenerationError): Record<string, unknown> {
  switch (error.kind) {
    case 'timeout':
      return { kind: error.kind, timeout_s: error.timeoutSeconds };
    case 'process':
      return { kind: error.kind, exit_code: error.exitCode, stderr: error.stderr };
    case 'cancelled':
      return { kind: error.kind };
  }
}

/**
 * Runs one user message through validation, crisis screening, need detection, prompt assembly,
 * generation and clean-up. Every path ends in exactly one reply; nothing here throws to the caller
 * and no diagnostic text reaches the reply.
 */
export class ConversationOrchestrator {
  private readonly settings: PipelineSettings;
  private readonly generator: GenerationProvider;
  private readonly instructions: InstructionSource;
  private readonly log: Logger;
  private readonly crisisPhrases: readonly string[];
  private readonly needKeywords: Readonly<Record<NeedCategory, readonly string[]>>;

  constructor(deps: OrchestratorDeps) {
    this.settings = deps.settings;
    this.generator = deps.generator;
    this.instructions = deps.instructions;
    this.log = deps.logger ?? createLogger('turn');
    this.crisisPhrases = deps.crisisPhrases ?? CRISIS_PHRASES;
    this.needKeywords = deps.needKeywords ?? NEED_KEYWORDS;
  }

  async handle(text: string, history: readonly Turn[], signal?: AbortSignal): Promise<TurnResult> {
    const fsm = new TurnFSM();
    const startedMs = Date.now();
    let userText = '';
    let needs: NeedCategory[] = [];

    const finish = (
      reply: string,
      extra: { rejection?: RejectionReason; failure?: FailureKind } = {}
    ): TurnResult => {
      const state = fsm.state;
      if (!isTerminal(state)) {
        throw new Error(`turn finished in non-terminal state ${state}`);
      }
      this.log.info('turn finished', {
        state,
        needs,
        input_chars: text.length,
        output_chars: reply.length,
        elapsed_ms: Date.now() - startedMs,
        ...extra
      });
      return { state, reply, needs, ...extra, turn: { userText, botText: reply }, trail: [...fsm.trail] };
    };

    try {
      const validation = validateInput(text, this.settings.maxInputLength);
      if (!validation.ok) {
        fsm.to(TurnState.REJECTED);
        const reply = validation.reason === 'empty' ? EMPTY_INPUT_REPLY : tooLongReply(this.settings.maxInputLength);
        return finish(reply, { rejection: validation.reason });
      }
      userText = validation.text;

      fsm.to(TurnState.CLASSIFYING);
      const crisisHits = matchedCrisisPhrases(userText, this.crisisPhrases);
      if (crisisHits.length > 0) {
        fsm.to(TurnState.CRISIS_SHORT_CIRCUIT);
        this.log.warn('crisis language detected, skipping generation', { phrases: crisisHits });
        return finish(CRISIS_REPLY);
      }
      needs = Array.from(detectNeeds(userText, this.needKeywords));

      fsm.to(TurnState.GENERATING);
      const prompt = buildPrompt({
        baseInstructions: await this.instructions.load(),
        needs,
        history,
        currentText: userText,
        maxHistoryTurns: this.settings.maxHistoryTurns,
        assistantLabel: this.settings.assistantLabel
      });
      const request: GenerationRequest = {
        prompt,
        maxTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        topP: this.settings.topP,
        timeoutSeconds: this.settings.timeoutSeconds
      };
      this.log.info('generating reply', {
        provider: this.generator.name,
        history_turns: Math.min(history.length, Math.max(0, this.settings.maxHistoryTurns)),
        prompt_chars: prompt.length,
        needs
      });
      const outcome = await this.generator.generate(request, signal);
      if (!outcome.ok) {
        fsm.to(TurnState.GENERATION_FAILED);
        this.log.error('generation failed', describeFailure(outcome.error));
        return finish(failureReply(outcome.error.kind), { failure: outcome.error.kind });
      }

      fsm.to(TurnState.SANITIZING);
      const reply = cleanResponse(outcome.text, prompt);
      fsm.to(TurnState.DONE);
      return finish(reply);
    } catch (err) {
      this.log.error('turn failed unexpectedly', { state: fsm.state, error: errorMessage(err) });
      if (!isTerminal(fsm.state)) fsm.fail();
      return finish(UNEXPECTED_ERROR_REPLY, { failure: 'unexpected' });
    }
  }
}
