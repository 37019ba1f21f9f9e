import test from 'node:test';
import assert from 'node:assert/strict';
import { isCrisis, matchedCrisisPhrases } from '../src/safety/crisis';
import { CRISIS_PHRASES } from '../src/safety/keywords';

test('every crisis phrase triggers regardless of case and position', () => {
  for (const phrase of CRISIS_PHRASES) {
    assert.equal(isCrisis(`Lately I think ${phrase.toUpperCase()} is where I am`), true, phrase);
  }
});

test('crisis detection flags the plain statement', () => {
  assert.equal(isCrisis('I want to die'), true);
});

test('crisis detection matches inside longer words', () => {
  assert.equal(isCrisis('the hopelessness is heavy'), true);
  assert.equal(isCrisis('I keep reading about suicides'), true);
});

test('ordinary messages are not crises', () => {
  assert.equal(isCrisis('I had a lovely day at the park'), false);
  assert.equal(isCrisis(''), false);
});

test('matched phrases come back in table order', () => {
  assert.deepEqual(matchedCrisisPhrases('I feel hopeless and worthless'), ['worthless', 'hopeless']);
});

test('a custom phrase list replaces the built-in one', () => {
  assert.equal(isCrisis('I want to die', ['rock bottom']), false);
  assert.equal(isCrisis('This is Rock Bottom', ['rock bottom']), true);
});
