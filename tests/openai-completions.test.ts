import test from 'node:test';
import assert from 'node:assert/strict';
import { APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import { OpenAICompletionsProvider, mapOpenAIError } from '../src/llm/openai-completions';
import { recordingLogger } from './helpers/fakes';

test('a client timeout maps to a timeout failure', () => {
  assert.deepEqual(mapOpenAIError(new APIConnectionTimeoutError(), 30), { kind: 'timeout', timeoutSeconds: 30 });
});

test('a user abort maps to a cancelled failure', () => {
  assert.deepEqual(mapOpenAIError(new APIUserAbortError(), 30), { kind: 'cancelled' });
});

test('an API error keeps its status as the exit code', () => {
  const error = mapOpenAIError(new APIError(503, undefined, 'overloaded', undefined), 30);
  assert.equal(error.kind, 'process');
  if (error.kind !== 'process') return;
  assert.equal(error.exitCode, 503);
  assert.match(error.stderr, /overloaded/);
});

test('any other error is a process failure without an exit code', () => {
  assert.deepEqual(mapOpenAIError(new Error('socket hang up'), 30), {
    kind: 'process',
    exitCode: null,
    stderr: 'socket hang up'
  });
});

test('an already aborted call never reaches the endpoint', async () => {
  const provider = new OpenAICompletionsProvider({
    apiKey: 'test-key',
    baseUrl: 'http://127.0.0.1:9/v1',
    model: 'local-model',
    repeatPenalty: 1.1,
    logger: recordingLogger()
  });
  const abort = new AbortController();
  abort.abort();

  const outcome = await provider.generate(
    { prompt: 'User: hi\nAssistant:', maxTokens: 16, temperature: 0.7, topP: 0.9, timeoutSeconds: 1 },
    abort.signal
  );
  assert.deepEqual(outcome, { ok: false, error: { kind: 'cancelled' } });
  assert.equal(provider.name, 'openai');
});
