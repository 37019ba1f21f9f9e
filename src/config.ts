export type GenerationProviderName = 'llama-cli' | 'openai';
export type AssistantLabel = 'Assistant' | 'Bot';

export type Config = {
  host: string;
  port: number;
  portSearchSpan: number;
  generationProvider: GenerationProviderName;
  llamaExecutable: string;
  modelPath: string;
  systemPromptFile: string;
  maxTokens: number;
  maxInputLength: number;
  maxHistoryTurns: number;
  temperature: number;
  topP: number;
  repeatPenalty: number;
  timeoutSeconds: number;
  assistantLabel: AssistantLabel;
  // how many generation calls may run at once across all sessions
  generationConcurrency: number;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
};

// Per-turn settings handed to the orchestrator; it never reads the env itself.
export type PipelineSettings = Pick<
  Config,
  'maxInputLength' | 'maxHistoryTurns' | 'maxTokens' | 'temperature' | 'topP' | 'timeoutSeconds' | 'assistantLabel'
>;

function resolveGenerationProvider(value: string | undefined): GenerationProviderName {
  switch (value) {
    case 'openai':
      return 'openai';
    case undefined:
    case 'llama-cli':
    default:
      return 'llama-cli';
  }
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '::1']);

// The UI is served to this machine only.
function resolveHost(value: string | undefined): string {
  return value && LOOPBACK_HOSTS.has(value) ? value : '127.0.0.1';
}

function resolveAssistantLabel(value: string | undefined): AssistantLabel {
  return value?.toLowerCase() === 'bot' ? 'Bot' : 'Assistant';
}

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function int(value: string | undefined, fallback: number, min = 1): number {
  return Math.max(min, Math.floor(num(value, fallback)));
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    host: resolveHost(env.HOST),
    port: int(env.PORT, 7860),
    portSearchSpan: int(env.PORT_SEARCH_SPAN, 10),
    generationProvider: resolveGenerationProvider(env.GENERATION_PROVIDER),
    llamaExecutable: env.LLAMA_EXECUTABLE ?? './llama.cpp/build/bin/llama-cli',
    modelPath: env.MODEL_PATH ?? 'llama.cpp/models/TinyLlama-1.1B-Chat-v1.0.Q4_K_M.gguf',
    systemPromptFile: env.SYSTEM_PROMPT_FILE ?? 'prompts/system_prompt.txt',
    maxTokens: int(env.MAX_TOKENS, 200),
    maxInputLength: int(env.MAX_INPUT_LENGTH, 1000),
    maxHistoryTurns: int(env.MAX_HISTORY_TURNS, 4, 0),
    temperature: num(env.TEMPERATURE, 0.7),
    topP: num(env.TOP_P, 0.9),
    repeatPenalty: num(env.REPEAT_PENALTY, 1.1),
    timeoutSeconds: int(env.GENERATION_TIMEOUT_SECONDS, 30),
    assistantLabel: resolveAssistantLabel(env.ASSISTANT_LABEL),
    generationConcurrency: int(env.GENERATION_CONCURRENCY, 1),
    openaiApiKey: env.OPENAI_API_KEY,
    openaiBaseUrl: env.OPENAI_BASE_URL,
    openaiModel: env.OPENAI_MODEL ?? 'gpt-3.5-turbo-instruct'
  };
}

export function pipelineSettings(cfg: Config): PipelineSettings {
  return {
    maxInputLength: cfg.maxInputLength,
    maxHistoryTurns: cfg.maxHistoryTurns,
    maxTokens: cfg.maxTokens,
    temperature: cfg.temperature,
    topP: cfg.topP,
    timeoutSeconds: cfg.timeoutSeconds,
    assistantLabel: cfg.assistantLabel
  };
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = resolveConfig();
