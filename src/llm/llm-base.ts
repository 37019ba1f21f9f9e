import type { Config } from '../config';
import { GateAbortedError, GenerationGate } from '../core/generation-gate';
import type { Logger } from '../observability/logger';
import { LlamaCliProvider } from './llama-cli';
import { OpenAICompletionsProvider } from './openai-completions';
import type { GenerationOutcome, GenerationProvider, GenerationRequest } from './types';

export function createGenerationProvider(cfg: Config, logger?: Logger): GenerationProvider {
  switch (cfg.generationProvider) {
    case 'llama-cli':
      return new LlamaCliProvider({
        executable: cfg.llamaExecutable,
        modelPath: cfg.modelPath,
        repeatPenalty: cfg.repeatPenalty,
        logger
      });
    case 'openai':
      return new OpenAICompletionsProvider({
        apiKey: cfg.openaiApiKey,
        baseUrl: cfg.openaiBaseUrl,
        model: cfg.openaiModel,
        repeatPenalty: cfg.repeatPenalty,
        logger
      });
    default:
      throw new Error(`Unsupported generation provider: ${String(cfg.generationProvider)}`);
  }
}

// Every generation goes through the gate, so the model is the one serialized resource across sessions.
export class GenerationClient implements GenerationProvider {
  private provider: GenerationProvider;
  private gate: GenerationGate;

  constructor(provider: GenerationProvider, gate: GenerationGate = new GenerationGate(1)) {
    this.provider = provider;
    this.gate = gate;
  }

  get name() {
    return this.provider.name;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationOutcome> {
    try {
      return await this.gate.run(() => this.provider.generate(request, signal), signal);
    } catch (err) {
      if (err instanceof GateAbortedError) return { ok: false, error: { kind: 'cancelled' } };
      throw err;
    }
  }
}
