import test from 'node:test';
import assert from 'node:assert/strict';
import { wsHandler } from '../src/adapters/ws-handler';
import { CompletionClient } from '../src/llm/completion-client';
import { config } from '../src/config';
import { FakeSocket, flush } from './helpers/fake-socket';
import { completionBody, fakeFetch, jsonResponse } from './helpers/fake-fetch';

function connect() {
  const fake = fakeFetch(() => jsonResponse(completionBody('4')));
  const socket = new FakeSocket();
  const client = new CompletionClient({ baseURL: 'https://llm.test/api/v1', model: 'test-model', fetch: fake.fetch });
  wsHandler(socket, { client, newSessionId: () => 'sid-test' });
  return { socket, calls: fake.calls };
}

test('submit before start is refused', async () => {
  const { socket, calls } = connect();
  socket.receive({ type: 'submit', api_key: 'valid-key', text: 'hi' });
  const [msg] = await socket.waitForCount(1);
  assert.deepEqual(msg, { type: 'error', code: 'NO_SESSION', message: 'send start first' });
  assert.equal(calls.length, 0);
});

test('start then submit streams the turns back to the client', async () => {
  const { socket, calls } = connect();
  socket.receive({ type: 'start' });
  await socket.waitForCount(2);
  socket.receive({ type: 'submit', api_key: 'valid-key', text: '2+2?' });
  const sent = await socket.waitForCount(6);

  assert.deepEqual(sent, [
    { type: 'ready', session_id: 'sid-test', title: config.chatTitle, subtitle: config.chatSubtitle },
    { type: 'history', turns: [] },
    { type: 'turn', turn: { role: 'user', content: '2+2?' } },
    { type: 'pending', pending: true },
    { type: 'turn', turn: { role: 'assistant', content: '4' } },
    { type: 'pending', pending: false }
  ]);
  assert.equal(calls[0].headers.get('authorization'), 'Bearer valid-key');
});

test('an unreadable frame is answered with BAD_MESSAGE', async () => {
  const { socket } = connect();
  socket.receive('{oops');
  const [msg] = await socket.waitForCount(1);
  assert.deepEqual(msg, { type: 'error', code: 'BAD_MESSAGE', message: 'frame is not valid JSON' });
  assert.equal(socket.closed, false);
});

test('ping is answered with pong', async () => {
  const { socket } = connect();
  socket.receive({ type: 'ping' });
  const [msg] = await socket.waitForCount(1);
  assert.equal(msg.type, 'pong');
});

test('fragmented frames are joined before parsing', async () => {
  const { socket } = connect();
  socket.emit('message', [Buffer.from('{"type":'), Buffer.from('"ping"}')]);
  const [msg] = await socket.waitForCount(1);
  assert.equal(msg.type, 'pong');
});

test('stop ends the session and closes the socket', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start' });
  await socket.waitForCount(2);
  socket.receive({ type: 'stop', reason: 'user_left' });
  const sent = await socket.waitForCount(3);
  await flush();

  assert.deepEqual(sent[2], { type: 'end', reason: 'user_left' });
  assert.equal(socket.closed, true);
});

test('a second start replaces the session with a fresh history', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start' });
  await socket.waitForCount(2);
  socket.receive({ type: 'submit', api_key: 'valid-key', text: 'hello' });
  await socket.waitForCount(6);
  socket.receive({ type: 'start' });
  const sent = await socket.waitForCount(9);

  assert.deepEqual(sent.slice(6), [
    { type: 'end', reason: 'restart' },
    { type: 'ready', session_id: 'sid-test', title: config.chatTitle, subtitle: config.chatSubtitle },
    { type: 'history', turns: [] }
  ]);
});

test('closing the socket stops the session', async () => {
  const { socket } = connect();
  socket.receive({ type: 'start' });
  await socket.waitForCount(2);
  socket.emit('close');
  const sent = await socket.waitForCount(3);
  assert.deepEqual(sent[2], { type: 'end', reason: 'ws_closed' });
});

test('a submit sent during a restart lands in the new session', async () => {
  let n = 0;
  const fake = fakeFetch(() => jsonResponse(completionBody('hi there')));
  const socket = new FakeSocket();
  const client = new CompletionClient({ baseURL: 'https://llm.test/api/v1', model: 'test-model', fetch: fake.fetch });
  wsHandler(socket, { client, newSessionId: () => `sid-${++n}` });

  socket.receive({ type: 'start' });
  await socket.waitForCount(2);
  socket.receive({ type: 'start' });
  socket.receive({ type: 'submit', api_key: 'valid-key', text: 'hello' });
  const sent = await socket.waitForCount(9);

  assert.deepEqual(sent.slice(2), [
    { type: 'end', reason: 'restart' },
    { type: 'ready', session_id: 'sid-2', title: config.chatTitle, subtitle: config.chatSubtitle },
    { type: 'history', turns: [] },
    { type: 'turn', turn: { role: 'user', content: 'hello' } },
    { type: 'pending', pending: true },
    { type: 'turn', turn: { role: 'assistant', content: 'hi there' } },
    { type: 'pending', pending: false }
  ]);
  assert.equal(fake.calls.length, 1);
});
