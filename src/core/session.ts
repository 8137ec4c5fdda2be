import { FSM, State } from './fsm';
import { ConversationStore, type Turn } from './conversation';
import { CompletionClient, describeResult } from '../llm/completion-client';
import type { ServerMessage } from '../adapters/protocol';
import { config } from '../config';
import { createLogger, errorMessage } from '../observability/logger';

const log = createLogger('session');

export type SendJson = (payload: ServerMessage) => Promise<void>;

/**
 * One browser connection: its own turn log, its own completion calls.
 *
 * At most one completion is outstanding; a second submit while waiting is
 * refused rather than queued.
 */
export class ChatSession {
  readonly sessionId: string;
  private sendJson: SendJson;
  private fsm = new FSM();
  private store = new ConversationStore();
  private client: CompletionClient;

  constructor(sessionId: string, sendJson: SendJson, client: CompletionClient = new CompletionClient()) {
    this.sessionId = sessionId;
    this.sendJson = sendJson;
    this.client = client;
  }

  get state(): State {
    return this.fsm.state;
  }

  history(): readonly Turn[] {
    return this.store.all();
  }

  async start() {
    log.info('session start', { sid: this.sessionId });
    await this.sendJson({
      type: 'ready',
      session_id: this.sessionId,
      title: config.chatTitle,
      subtitle: config.chatSubtitle
    });
    await this.sendJson({ type: 'history', turns: this.store.all() });
  }

  async submit(credential: string, text: string) {
    if (this.inState(State.ENDED)) return;
    if (this.inState(State.AWAITING_COMPLETION)) {
      await this.sendJson({ type: 'notice', code: 'BUSY', message: 'Still waiting for the previous reply.' });
      return;
    }
    if (text.trim().length === 0) {
      await this.sendJson({ type: 'notice', code: 'EMPTY_INPUT', message: describeResult({ kind: 'empty_input' }) });
      return;
    }

    this.fsm.transition(State.AWAITING_COMPLETION);
    try {
      const userTurn = this.store.append({ role: 'user', content: text });
      await this.notify({ type: 'turn', turn: userTurn });
      await this.notify({ type: 'pending', pending: true });

      const startedAt = Date.now();
      const result = await this.client.request(credential, text);
      log.info('completion finished', {
        sid: this.sessionId,
        kind: result.kind,
        elapsed_ms: Date.now() - startedAt
      });

      // a stop during the call discards the reply along with the session
      if (this.inState(State.ENDED)) return;

      const assistantTurn = this.store.append({ role: 'assistant', content: describeResult(result) });
      this.fsm.transition(State.READY);
      await this.notify({ type: 'turn', turn: assistantTurn });
      await this.notify({ type: 'pending', pending: false });
    } finally {
      if (this.inState(State.AWAITING_COMPLETION)) this.fsm.transition(State.READY);
    }
  }

  private inState(state: State): boolean {
    return this.fsm.state === state;
  }

  // a failed send must not leave the turn log half-written
  private async notify(payload: ServerMessage) {
    try {
      await this.sendJson(payload);
    } catch (err) {
      log.warn('frame not delivered', { sid: this.sessionId, type: payload.type, error: errorMessage(err) });
    }
  }

  async stop(reason = 'stop') {
    if (this.inState(State.ENDED)) return;
    log.info('session stop', { sid: this.sessionId, reason, turns: this.store.size });
    this.fsm.transition(State.ENDED);
    try {
      await this.sendJson({ type: 'end', reason });
    } catch (err) {
      // socket may already be gone during shutdown
      log.debug('end frame not delivered', { sid: this.sessionId, error: errorMessage(err) });
    }
  }
}
