import test from 'node:test';
import assert from 'node:assert/strict';
import { EMPTY_RESPONSE_FALLBACK, cleanResponse } from '../src/llm/sanitizer';

test('text after the assistant marker is kept', () => {
  assert.equal(cleanResponse('Assistant: Hello there.'), 'Hello there.');
});

test('the prompt echo is removed from the output', () => {
  const prompt = 'BASE\n\nUser: hi\nAssistant:';
  assert.equal(cleanResponse(`${prompt} I am here for you. How are you feeling?`, prompt), 'I am here for you. How are you feeling?');
});

test('the right-most marker wins', () => {
  assert.equal(cleanResponse('Assistant: first. Bot: second answer.'), 'second answer.');
  assert.equal(cleanResponse('Here is my Response: ok then.'), 'ok then.');
});

test('invented dialogue lines are dropped and the rest joined', () => {
  assert.equal(cleanResponse('Sure thing.\nUser: more?\nQ: what\n\nThat helps.'), 'Sure thing. That helps.');
  assert.equal(cleanResponse('Okay.\nHuman: hey\nA: answer\nQuestion: why'), 'Okay.');
});

test('a short fragment after the last period is cut', () => {
  assert.equal(cleanResponse('You are doing well. Tr'), 'You are doing well.');
  assert.equal(cleanResponse('You are doing well. Try'), 'You are doing well. Try');
});

test('text without a period is left alone', () => {
  assert.equal(cleanResponse('hello'), 'hello');
});

test('nothing left after cleaning gives the fallback', () => {
  assert.equal(cleanResponse(''), EMPTY_RESPONSE_FALLBACK);
  assert.equal(cleanResponse('   \n  '), EMPTY_RESPONSE_FALLBACK);
  assert.equal(cleanResponse('User: hello'), EMPTY_RESPONSE_FALLBACK);
  assert.equal(cleanResponse('Assistant:'), EMPTY_RESPONSE_FALLBACK);
});

test('cleaning already clean text changes nothing', () => {
  const once = cleanResponse('I hear you. That sounds really hard.');
  assert.equal(once, 'I hear you. That sounds really hard.');
  assert.equal(cleanResponse(once), once);
});
