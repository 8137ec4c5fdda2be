import type { Turn } from '../core/conversation';

export type ClientMessage =
  | { type: 'start' }
  | { type: 'submit'; api_key: string; text: string }
  | { type: 'stop'; reason?: string }
  | { type: 'ping' };

export type NoticeCode = 'EMPTY_INPUT' | 'BUSY';
export type ErrorCode = 'NO_SESSION' | 'BAD_MESSAGE' | 'WS_HANDLER_ERROR';

export type ServerMessage =
  | { type: 'ready'; session_id: string; title: string; subtitle: string }
  | { type: 'history'; turns: readonly Turn[] }
  | { type: 'turn'; turn: Turn }
  | { type: 'pending'; pending: boolean }
  | { type: 'notice'; code: NoticeCode; message: string }
  | { type: 'error'; code: ErrorCode; message: string }
  | { type: 'pong'; ts_ms: number }
  | { type: 'end'; reason: string };

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

function field(obj: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(obj, key) ? Reflect.get(obj, key) : undefined;
}

export function parseClientMessage(raw: string): ClientMessage {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    throw new ProtocolError('frame is not valid JSON');
  }
  if (typeof msg !== 'object' || msg === null) throw new ProtocolError('frame must be a JSON object');

  const type = field(msg, 'type');
  switch (type) {
    case 'start':
    case 'ping':
      return { type };
    case 'stop': {
      const reason = field(msg, 'reason');
      return typeof reason === 'string' ? { type, reason } : { type };
    }
    case 'submit': {
      const apiKey = field(msg, 'api_key') ?? '';
      const text = field(msg, 'text') ?? '';
      if (typeof apiKey !== 'string' || typeof text !== 'string') {
        throw new ProtocolError('submit requires string api_key and text');
      }
      return { type, api_key: apiKey, text };
    }
    default:
      throw new ProtocolError(`unknown frame type: ${String(type)}`);
  }
}

// never let the credential reach a log line
export function summarizeClientMessage(msg: ClientMessage): Record<string, unknown> {
  if (msg.type === 'submit') {
    return { type: msg.type, api_key: msg.api_key ? '<redacted>' : '', text_len: msg.text.length };
  }
  return { ...msg };
}

export function summarizeServerMessage(msg: ServerMessage): Record<string, unknown> {
  if (msg.type === 'turn' && msg.turn.content.length > 80) {
    return {
      type: msg.type,
      role: msg.turn.role,
      content: `${msg.turn.content.slice(0, 80)}...`,
      content_len: msg.turn.content.length
    };
  }
  if (msg.type === 'history') {
    return { type: msg.type, turns: msg.turns.length };
  }
  return { ...msg };
}
