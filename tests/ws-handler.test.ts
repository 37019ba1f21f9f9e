import test from 'node:test';
import assert from 'node:assert/strict';
import { wsHandler } from '../src/adapters/ws-handler';
import { ConversationOrchestrator } from '../src/orchestrator/conversation';
import { CRISIS_REPLY } from '../src/orchestrator/replies';
import { StaticInstructionSource } from '../src/prompt/instructions';
import { FakeGenerator, FakeSocket, recordingLogger, settings, until } from './helpers/fakes';

function connect(generator = new FakeGenerator()) {
  const socket = new FakeSocket();
  const orchestrator = new ConversationOrchestrator({
    settings,
    generator,
    instructions: new StaticInstructionSource('BASE'),
    logger: recordingLogger()
  });
  wsHandler(socket, orchestrator);
  return { socket, generator };
}

test('start answers with ready and keeps the given session id', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start', session_id: 'abc' });
  await until(() => socket.sent.length === 1);
  assert.deepEqual(socket.sent, [{ type: 'ready', session_id: 'abc' }]);
});

test('start without an id gets a generated one', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start' });
  await until(() => socket.sent.length === 1);
  assert.equal(socket.sent[0]?.type, 'ready');
  assert.match(String(socket.sent[0]?.session_id), /^[0-9a-f-]{36}$/);
});

test('a message is answered in the same session', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start', session_id: 'abc' });
  await until(() => socket.sent.length === 1);
  socket.receive({ type: 'message', text: 'I want to die' });
  await until(() => socket.sent.length === 2);

  assert.deepEqual(socket.sent[1], {
    type: 'reply',
    text: CRISIS_REPLY,
    state: 'CRISIS_SHORT_CIRCUIT',
    needs: [],
    turn: 1
  });
});

test('a message before start is refused', async () => {
  const { socket, generator } = connect();
  socket.receive({ type: 'message', text: 'hello' });
  await until(() => socket.sent.length === 1);
  assert.deepEqual(socket.sent, [{ type: 'error', code: 'NO_SESSION', message: 'send start first' }]);
  assert.equal(generator.requests.length, 0);
});

test('a message without text goes through validation as empty', async () => {
  const { socket, generator } = connect();
  socket.receive({ type: 'start', session_id: 'abc' });
  socket.receive({ type: 'message', text: 42 });
  await until(() => socket.sent.length === 2);
  assert.equal(socket.sent[1]?.state, 'REJECTED');
  assert.equal(generator.requests.length, 0);
});

test('ping is answered with pong', async () => {
  const { socket } = connect();
  socket.receive({ type: 'ping' });
  await until(() => socket.sent.length === 1);
  assert.equal(socket.sent[0]?.type, 'pong');
  assert.equal(typeof socket.sent[0]?.ts_ms, 'number');
});

test('unknown types and malformed frames get error frames', async () => {
  const { socket } = connect();
  socket.receive({ type: 'dance' });
  await until(() => socket.sent.length === 1);
  socket.receive('not json');
  await until(() => socket.sent.length === 2);
  socket.receive('[1, 2]');
  await until(() => socket.sent.length === 3);

  assert.deepEqual(socket.sent, [
    { type: 'error', code: 'UNKNOWN_TYPE', message: 'unsupported message type' },
    { type: 'error', code: 'WS_HANDLER_ERROR', message: 'invalid websocket message' },
    { type: 'error', code: 'WS_HANDLER_ERROR', message: 'invalid websocket message' }
  ]);
});

test('starting again ends the previous session first', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start', session_id: 'one' });
  await until(() => socket.sent.length === 1);
  socket.receive({ type: 'start', session_id: 'two' });
  await until(() => socket.sent.length === 3);

  assert.deepEqual(socket.sent, [
    { type: 'ready', session_id: 'one' },
    { type: 'end', reason: 'restart' },
    { type: 'ready', session_id: 'two' }
  ]);
});

test('reset and stop are forwarded and stop closes the socket', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start', session_id: 'abc' });
  socket.receive({ type: 'reset' });
  await until(() => socket.sent.length === 2);
  socket.receive({ type: 'stop', reason: 'done' });
  await until(() => socket.closed);

  assert.deepEqual(socket.sent, [
    { type: 'ready', session_id: 'abc' },
    { type: 'reset' },
    { type: 'end', reason: 'done' }
  ]);
});

test('closing the socket ends the session', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start', session_id: 'abc' });
  await until(() => socket.sent.length === 1);
  socket.emit('close');
  await until(() => socket.sent.length === 2);
  assert.deepEqual(socket.sent[1], { type: 'end', reason: 'ws_closed' });
});
