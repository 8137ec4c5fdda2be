export enum State {
  READY = 'READY',
  AWAITING_COMPLETION = 'AWAITING_COMPLETION',
  ENDED = 'ENDED'
}

const allowed: Record<State, State[]> = {
  [State.READY]: [State.AWAITING_COMPLETION, State.ENDED],
  [State.AWAITING_COMPLETION]: [State.READY, State.ENDED],
  [State.ENDED]: []
};

export class IllegalTransitionError extends Error {
  constructor(from: State, to: State) {
    super(`illegal session transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class FSM {
  state: State = State.READY;

  can(next: State): boolean {
    return allowed[this.state].includes(next);
  }

  transition(next: State): void {
    if (!this.can(next)) throw new IllegalTransitionError(this.state, next);
    this.state = next;
  }
}
