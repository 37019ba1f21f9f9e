import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { createLogger, type Logger } from '../observability/logger';
import type { GenerationOutcome, GenerationProvider, GenerationRequest, GenerationResult } from './types';

export interface GenerationProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export type SpawnProcess = (command: string, args: string[]) => GenerationProcess;

export type LlamaCliOptions = {
  executable: string;
  modelPath: string;
  repeatPenalty: number;
  spawnProcess?: SpawnProcess;
  logger?: Logger;
};

const spawnDetachedIo: SpawnProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

export function buildLlamaArgs(request: GenerationRequest, modelPath: string, repeatPenalty: number): string[] {
  return [
    '-m',
    modelPath,
    '-p',
    request.prompt,
    '-n',
    String(request.maxTokens),
    '--temp',
    String(request.temperature),
    '--top-p',
    String(request.topP),
    '--repeat-penalty',
    String(repeatPenalty),
    '-no-cnv', // one-shot completion, no interactive chat loop
    '--simple-io',
    '--no-warmup'
  ];
}

/**
 * Runs the llama.cpp command line once per request. The child is killed with SIGKILL when the
 * timeout fires or the caller aborts, and the promise settles only after the child has closed.
 */
export class LlamaCliProvider implements GenerationProvider {
  readonly name = 'llama-cli';
  private readonly spawnProcess: SpawnProcess;
  private readonly log: Logger;

  constructor(private readonly opts: LlamaCliOptions) {
    this.spawnProcess = opts.spawnProcess ?? spawnDetachedIo;
    this.log = opts.logger ?? createLogger('llama-cli');
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationOutcome> {
    if (signal?.aborted) return { ok: false, error: { kind: 'cancelled' } };

    const args = buildLlamaArgs(request, this.opts.modelPath, this.opts.repeatPenalty);
    const startedMs = Date.now();
    const run = await this.runProcess(args, request.timeoutSeconds * 1000, signal);
    const elapsedMs = Date.now() - startedMs;

    if (run.timedOut) {
      this.log.error('llama-cli timed out', { timeout_s: request.timeoutSeconds, elapsed_ms: elapsedMs });
      return { ok: false, error: { kind: 'timeout', timeoutSeconds: request.timeoutSeconds } };
    }
    if (run.cancelled) {
      this.log.warn('llama-cli cancelled by caller', { elapsed_ms: elapsedMs });
      return { ok: false, error: { kind: 'cancelled' } };
    }
    if (run.result.exitCode !== 0) {
      const stderr = run.result.stderr.trim() || 'Unknown error';
      this.log.error('llama-cli failed', { exit_code: run.result.exitCode, stderr });
      return { ok: false, error: { kind: 'process', exitCode: run.result.exitCode, stderr } };
    }
    this.log.debug('llama-cli done', { elapsed_ms: elapsedMs, stdout_len: run.result.stdout.length });
    return { ok: true, text: run.result.stdout };
  }

  private runProcess(
    args: string[],
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<{ result: GenerationResult; timedOut: boolean; cancelled: boolean }> {
    return new Promise((resolve) => {
      // decoded once on close so a character split across chunks survives
      const outChunks: Buffer[] = [];
      const errChunks: Buffer[] = [];
      let timedOut = false;
      let cancelled = false;
      let settled = false;

      let child: GenerationProcess;
      try {
        child = this.spawnProcess(this.opts.executable, args);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        resolve({ result: { exitCode: null, stdout: '', stderr: message }, timedOut: false, cancelled: false });
        return;
      }

      const onAbort = () => {
        cancelled = true;
        child.kill('SIGKILL');
      };
      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (exitCode: number | null, extraStderr?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const stdout = Buffer.concat(outChunks).toString('utf8');
        const stderr = Buffer.concat(errChunks).toString('utf8');
        const err = extraStderr ? `${stderr}${stderr ? '\n' : ''}${extraStderr}` : stderr;
        resolve({ result: { exitCode, stdout, stderr: err }, timedOut, cancelled });
      };

      child.stdout.on('data', (chunk: Buffer | string) => outChunks.push(Buffer.from(chunk)));
      child.stderr.on('data', (chunk: Buffer | string) => errChunks.push(Buffer.from(chunk)));
      // spawn failures (ENOENT, EACCES) arrive here and no close follows
      child.on('error', (err) => finish(null, err.message));
      child.on('close', (code) => finish(code));
    });
  }
}
