import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import { createLogger, errorMessage, type Logger } from '../observability/logger';
import type { GenerationError, GenerationOutcome, GenerationProvider, GenerationRequest } from './types';

export type OpenAICompletionsOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  repeatPenalty: number;
  logger?: Logger;
};

export function mapOpenAIError(err: unknown, timeoutSeconds: number): GenerationError {
  // the timeout error is an APIError subclass, so it has to be checked first
  if (err instanceof APIConnectionTimeoutError) return { kind: 'timeout', timeoutSeconds };
  if (err instanceof APIUserAbortError) return { kind: 'cancelled' };
  if (err instanceof APIError) return { kind: 'process', exitCode: err.status ?? null, stderr: err.message };
  return { kind: 'process', exitCode: null, stderr: errorMessage(err) };
}

/**
 * Text completion against an OpenAI-compatible /v1/completions endpoint, e.g. a llama.cpp server
 * already holding the model in memory.
 */
export class OpenAICompletionsProvider implements GenerationProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;
  private log: Logger;

  constructor(private readonly opts: OpenAICompletionsOptions) {
    this.client = new OpenAI({
      // local servers ignore the key but the SDK insists on one
      apiKey: opts.apiKey ?? 'not-set',
      baseURL: opts.baseUrl
    });
    this.model = opts.model;
    this.log = opts.logger ?? createLogger('openai');
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationOutcome> {
    if (signal?.aborted) return { ok: false, error: { kind: 'cancelled' } };
    try {
      const completion = await this.client.completions.create(
        {
          model: this.model,
          prompt: request.prompt,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          top_p: request.topP,
          // closest knob the API has to llama.cpp's repeat penalty
          frequency_penalty: Math.max(0, this.opts.repeatPenalty - 1)
        },
        { signal, timeout: request.timeoutSeconds * 1000, maxRetries: 0 }
      );
      return { ok: true, text: completion.choices[0]?.text ?? '' };
    } catch (err) {
      const error = mapOpenAIError(err, request.timeoutSeconds);
      this.log.error('openai completion failed', { kind: error.kind, error: errorMessage(err) });
      return { ok: false, error };
    }
  }
}
