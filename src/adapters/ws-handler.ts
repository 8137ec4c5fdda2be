import { randomUUID } from 'node:crypto';
import type { RawData } from 'ws';
import { ChatSession } from '../core/session';
import { CompletionClient } from '../llm/completion-client';
import { createLogger, errorMessage } from '../observability/logger';
import {
  ProtocolError,
  parseClientMessage,
  summarizeClientMessage,
  summarizeServerMessage,
  type ServerMessage
} from './protocol';

const log = createLogger('ws');

const nowMs = () => Date.now();

// the part of a `ws` WebSocket the handler relies on
export interface ChatSocket {
  send(data: string): void;
  close(): void;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
}

export type WsHandlerOptions = {
  client?: CompletionClient;
  newSessionId?: () => string;
};

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function wsHandler(socket: ChatSocket, opts: WsHandlerOptions = {}) {
  const client = opts.client ?? new CompletionClient();
  const newSessionId = opts.newSessionId ?? randomUUID;
  let session: ChatSession | null = null;
  // frames that arrive mid-restart wait for the new session
  let starting: Promise<void> = Promise.resolve();

  const sendJson = async (payload: ServerMessage) => {
    log.debug('ws->client', summarizeServerMessage(payload));
    socket.send(JSON.stringify(payload));
  };

  const handleMessage = async (data: RawData) => {
    try {
      const msg = parseClientMessage(rawToString(data));
      log.debug('client->ws', summarizeClientMessage(msg));

      switch (msg.type) {
        case 'start': {
          const run = starting.then(async () => {
            if (session) await session.stop('restart');
            session = new ChatSession(newSessionId(), sendJson, client);
            await session.start();
          });
          starting = run.catch((err: unknown) => {
            log.warn('session start failed', { error: errorMessage(err) });
          });
          await run;
          return;
        }
        case 'submit': {
          await starting;
          if (!session) {
            await sendJson({ type: 'error', code: 'NO_SESSION', message: 'send start first' });
            return;
          }
          await session.submit(msg.api_key, msg.text);
          return;
        }
        case 'stop': {
          await starting;
          if (session) await session.stop(msg.reason ?? 'stop');
          socket.close();
          return;
        }
        case 'ping':
          await sendJson({ type: 'pong', ts_ms: nowMs() });
          return;
      }
    } catch (e) {
      if (e instanceof ProtocolError) {
        log.warn('bad client frame', { error: e.message });
        await sendJson({ type: 'error', code: 'BAD_MESSAGE', message: e.message });
        return;
      }
      log.error('ws handler error', { error: errorMessage(e) });
      await sendJson({ type: 'error', code: 'WS_HANDLER_ERROR', message: 'failed to handle websocket message' });
    }
  };

  socket.on('message', (data: RawData) => {
    handleMessage(data).catch((err: unknown) => {
      log.error('ws reply failed', { error: errorMessage(err) });
    });
  });

  socket.on('close', () => {
    if (!session) return;
    log.info('ws close', { sid: session.sessionId });
    session.stop('ws_closed').catch((err: unknown) => {
      log.error('session stop failed', { error: errorMessage(err) });
    });
  });
}
