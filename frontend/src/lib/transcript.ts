import type { Role, Turn } from '../../../src/core/conversation';
import type { ErrorCode, NoticeCode, ServerMessage } from '../../../src/adapters/protocol';

export type { Turn, ServerMessage };

export interface TranscriptState {
  sessionId: string;
  title: string;
  subtitle: string;
  turns: readonly Turn[];
  pending: boolean;
  notice: string;
  ended: boolean;
}

export const initialTranscript: TranscriptState = {
  sessionId: '',
  title: '',
  subtitle: '',
  turns: [],
  pending: false,
  notice: '',
  ended: false
};

function str(obj: object, key: string): string | undefined {
  const v: unknown = Reflect.get(obj, key);
  return typeof v === 'string' ? v : undefined;
}

function isRole(v: string | undefined): v is Role {
  return v === 'user' || v === 'assistant';
}

function isNoticeCode(v: string | undefined): v is NoticeCode {
  return v === 'EMPTY_INPUT' || v === 'BUSY';
}

function isErrorCode(v: string | undefined): v is ErrorCode {
  return v === 'NO_SESSION' || v === 'BAD_MESSAGE' || v === 'WS_HANDLER_ERROR';
}

function toTurn(v: unknown): Turn | null {
  if (typeof v !== 'object' || v === null) return null;
  const role = str(v, 'role');
  const content = str(v, 'content');
  if (!isRole(role) || content === undefined) return null;
  return { role, content };
}

export function parseServerMessage(raw: string): ServerMessage | null {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof msg !== 'object' || msg === null) return null;

  switch (str(msg, 'type')) {
    case 'ready':
      return {
        type: 'ready',
        session_id: str(msg, 'session_id') ?? '',
        title: str(msg, 'title') ?? '',
        subtitle: str(msg, 'subtitle') ?? ''
      };
    case 'history': {
      const turns: unknown = Reflect.get(msg, 'turns');
      if (!Array.isArray(turns)) return null;
      const parsed = turns.map(toTurn);
      return parsed.every((t): t is Turn => t !== null) ? { type: 'history', turns: parsed } : null;
    }
    case 'turn': {
      const turn = toTurn(Reflect.get(msg, 'turn'));
      return turn ? { type: 'turn', turn } : null;
    }
    case 'pending':
      return { type: 'pending', pending: Reflect.get(msg, 'pending') === true };
    case 'notice': {
      const code = str(msg, 'code');
      return isNoticeCode(code) ? { type: 'notice', code, message: str(msg, 'message') ?? '' } : null;
    }
    case 'error': {
      const code = str(msg, 'code');
      return isErrorCode(code) ? { type: 'error', code, message: str(msg, 'message') ?? '' } : null;
    }
    case 'pong': {
      const ts: unknown = Reflect.get(msg, 'ts_ms');
      return { type: 'pong', ts_ms: typeof ts === 'number' ? ts : 0 };
    }
    case 'end':
      return { type: 'end', reason: str(msg, 'reason') ?? '' };
    default:
      return null;
  }
}

export function applyServerMessage(state: TranscriptState, msg: ServerMessage): TranscriptState {
  switch (msg.type) {
    case 'ready':
      return {
        ...initialTranscript,
        sessionId: msg.session_id,
        title: msg.title,
        subtitle: msg.subtitle
      };
    case 'history':
      return { ...state, turns: msg.turns.slice() };
    case 'turn':
      return { ...state, turns: [...state.turns, msg.turn], notice: '' };
    case 'pending':
      return { ...state, pending: msg.pending };
    case 'notice':
    case 'error':
      return { ...state, notice: msg.message };
    case 'end':
      return { ...state, pending: false, ended: true };
    case 'pong':
      return state;
  }
}
