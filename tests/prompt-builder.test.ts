import test from 'node:test';
import assert from 'node:assert/strict';
import { buildPrompt, needHint, trailingWindow } from '../src/prompt/builder';
import type { Turn } from '../src/core/context';

const turns = (n: number): Turn[] =>
  Array.from({ length: n }, (_, i) => ({ userText: `u${i + 1}`, botText: `b${i + 1}` }));

test('prompt with no needs and no history', () => {
  const prompt = buildPrompt({ baseInstructions: 'BASE', needs: [], history: [], currentText: 'hello', maxHistoryTurns: 4 });
  assert.equal(prompt, 'BASE\n\nUser: hello\nAssistant:');
});

test('prompt carries one hint line listing every need', () => {
  const prompt = buildPrompt({
    baseInstructions: 'BASE',
    needs: ['sensory', 'executive'],
    history: [],
    currentText: 'hi',
    maxHistoryTurns: 4
  });
  assert.equal(
    prompt,
    'BASE\n\nThe user may be experiencing challenges related to: sensory, executive. Provide specific, practical support for these areas.\n\nUser: hi\nAssistant:'
  );
});

test('prompt accepts needs as a set', () => {
  const prompt = buildPrompt({
    baseInstructions: 'BASE',
    needs: new Set(['meltdown'] as const),
    history: [],
    currentText: 'hi',
    maxHistoryTurns: 4
  });
  assert.ok(prompt.includes(`\n\n${needHint(['meltdown'])}\n\n`));
});

test('prompt keeps only the trailing history window, oldest first', () => {
  const prompt = buildPrompt({ baseInstructions: 'BASE', needs: [], history: turns(5), currentText: 'now', maxHistoryTurns: 2 });
  assert.equal(prompt, 'BASE\n\nUser: u4\nAssistant: b4\nUser: u5\nAssistant: b5\nUser: now\nAssistant:');
});

test('prompt with a zero window has no history', () => {
  const prompt = buildPrompt({ baseInstructions: 'BASE', needs: [], history: turns(3), currentText: 'now', maxHistoryTurns: 0 });
  assert.equal(prompt, 'BASE\n\nUser: now\nAssistant:');
});

test('incomplete turns are skipped before the window is taken', () => {
  const history: Turn[] = [
    { userText: 'u1', botText: 'b1' },
    { userText: '', botText: 'rejected' },
    { userText: 'u3', botText: 'b3' }
  ];
  const prompt = buildPrompt({ baseInstructions: 'BASE', needs: [], history, currentText: 'now', maxHistoryTurns: 2 });
  assert.equal(prompt, 'BASE\n\nUser: u1\nAssistant: b1\nUser: u3\nAssistant: b3\nUser: now\nAssistant:');
});

test('blank submissions do not push real turns out of the window', () => {
  const rejected: Turn = { userText: '', botText: "I'm here when you're ready to share. Take your time." };
  const history: Turn[] = [
    { userText: 'I had a meltdown at work', botText: 'That sounds exhausting.' },
    rejected,
    rejected,
    rejected,
    rejected
  ];
  const prompt = buildPrompt({
    baseInstructions: 'BASE',
    needs: [],
    history,
    currentText: 'what should I do?',
    maxHistoryTurns: 4
  });
  assert.equal(
    prompt,
    'BASE\n\nUser: I had a meltdown at work\nAssistant: That sounds exhausting.\nUser: what should I do?\nAssistant:'
  );
});

test('prompt uses the configured assistant label', () => {
  const prompt = buildPrompt({
    baseInstructions: 'BASE',
    needs: [],
    history: turns(1),
    currentText: 'now',
    maxHistoryTurns: 4,
    assistantLabel: 'Bot'
  });
  assert.equal(prompt, 'BASE\n\nUser: u1\nBot: b1\nUser: now\nBot:');
});

test('trailing window handles sizes larger than the history', () => {
  assert.deepEqual(trailingWindow(turns(2), 10), turns(2));
  assert.deepEqual(trailingWindow(turns(2), -1), []);
});

test('no needs means no hint sentence', () => {
  const prompt = buildPrompt({ baseInstructions: 'BASE', needs: [], history: turns(2), currentText: 'hi', maxHistoryTurns: 4 });
  assert.equal(prompt.includes('may be experiencing challenges'), false);
});
