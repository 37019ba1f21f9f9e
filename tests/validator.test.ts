import test from 'node:test';
import assert from 'node:assert/strict';
import { validateInput } from '../src/safety/validator';

test('validator rejects empty and whitespace-only input', () => {
  assert.deepEqual(validateInput('', 1000), { ok: false, reason: 'empty' });
  assert.deepEqual(validateInput('   \n\t ', 1000), { ok: false, reason: 'empty' });
});

test('validator rejects input over the limit and accepts input at it', () => {
  assert.deepEqual(validateInput('a'.repeat(1001), 1000), { ok: false, reason: 'too_long' });
  assert.deepEqual(validateInput('a'.repeat(1000), 1000), { ok: true, text: 'a'.repeat(1000) });
});

test('validator counts characters rather than UTF-16 units', () => {
  assert.deepEqual(validateInput('😀😀😀', 3), { ok: true, text: '😀😀😀' });
});

test('validator strips control characters and trims', () => {
  assert.deepEqual(validateInput('  hi\x00 there\x07 ', 1000), { ok: true, text: 'hi there' });
  assert.deepEqual(validateInput('line one\nline\ttwo', 1000), { ok: true, text: 'line one\nline\ttwo' });
});

test('validator treats input made only of control characters as empty', () => {
  assert.deepEqual(validateInput('\x01\x02', 1000), { ok: false, reason: 'empty' });
});

test('validator does not judge content', () => {
  assert.deepEqual(validateInput('this damn day sucks', 1000), { ok: true, text: 'this damn day sucks' });
});
