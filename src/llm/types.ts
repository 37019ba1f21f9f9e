export type GenerationRequest = {
  prompt: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  timeoutSeconds: number;
};

// What one run of the generation executable left behind.
export type GenerationResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export type GenerationError =
  | { kind: 'timeout'; timeoutSeconds: number }
  | { kind: 'process'; exitCode: number | null; stderr: string }
  | { kind: 'cancelled' };

export type GenerationErrorKind = GenerationError['kind'];

export type GenerationOutcome = { ok: true; text: string } | { ok: false; error: GenerationError };

export interface GenerationProvider {
  readonly name: string;
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationOutcome>;
}
