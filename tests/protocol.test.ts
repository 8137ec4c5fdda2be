import test from 'node:test';
import assert from 'node:assert/strict';
import {
  ProtocolError,
  parseClientMessage,
  summarizeClientMessage,
  summarizeServerMessage
} from '../src/adapters/protocol';

test('parses the client frame types', () => {
  assert.deepEqual(parseClientMessage('{"type":"start"}'), { type: 'start' });
  assert.deepEqual(parseClientMessage('{"type":"ping","extra":1}'), { type: 'ping' });
  assert.deepEqual(parseClientMessage('{"type":"stop","reason":"bye"}'), { type: 'stop', reason: 'bye' });
  assert.deepEqual(parseClientMessage('{"type":"stop","reason":5}'), { type: 'stop' });
  assert.deepEqual(parseClientMessage('{"type":"submit","api_key":"test-key","text":"hi"}'), {
    type: 'submit',
    api_key: 'test-key',
    text: 'hi'
  });
});

test('submit fields default to empty strings when absent', () => {
  assert.deepEqual(parseClientMessage('{"type":"submit"}'), { type: 'submit', api_key: '', text: '' });
});

test('rejects frames that do not fit the protocol', () => {
  assert.throws(() => parseClientMessage('not json'), /not valid JSON/);
  assert.throws(() => parseClientMessage('[1,2]'), ProtocolError);
  assert.throws(() => parseClientMessage('null'), /must be a JSON object/);
  assert.throws(() => parseClientMessage('{"type":"audio"}'), /unknown frame type: audio/);
  assert.throws(() => parseClientMessage('{"type":"submit","text":42}'), /string api_key and text/);
});

test('client summaries never include the credential', () => {
  const summary = summarizeClientMessage({ type: 'submit', api_key: 'test-secret', text: 'hello' });
  assert.deepEqual(summary, { type: 'submit', api_key: '<redacted>', text_len: 5 });
  assert.deepEqual(summarizeClientMessage({ type: 'submit', api_key: '', text: '' }), {
    type: 'submit',
    api_key: '',
    text_len: 0
  });
});

test('server summaries shorten long turns and histories', () => {
  const long = 'x'.repeat(100);
  assert.deepEqual(summarizeServerMessage({ type: 'turn', turn: { role: 'assistant', content: long } }), {
    type: 'turn',
    role: 'assistant',
    content: `${'x'.repeat(80)}...`,
    content_len: 100
  });
  assert.deepEqual(
    summarizeServerMessage({ type: 'history', turns: [{ role: 'user', content: 'a' }] }),
    { type: 'history', turns: 1 }
  );
  assert.deepEqual(summarizeServerMessage({ type: 'pong', ts_ms: 1 }), { type: 'pong', ts_ms: 1 });
});
