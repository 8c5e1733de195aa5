export enum State {
  AWAITING_FIRST_RESPONSE = 'AWAITING_FIRST_RESPONSE',
  EXECUTING_TOOLS = 'EXECUTING_TOOLS',
  AWAITING_SECOND_RESPONSE = 'AWAITING_SECOND_RESPONSE',
  FINALIZE = 'FINALIZE',
  DONE = 'DONE',
  FAILED = 'FAILED'
}

const TRANSITIONS: Record<State, readonly State[]> = {
  [State.AWAITING_FIRST_RESPONSE]: [State.EXECUTING_TOOLS, State.FINALIZE, State.FAILED],
  [State.EXECUTING_TOOLS]: [State.AWAITING_SECOND_RESPONSE, State.FAILED],
  [State.AWAITING_SECOND_RESPONSE]: [State.FINALIZE, State.FAILED],
  [State.FINALIZE]: [State.DONE, State.FAILED],
  [State.DONE]: [],
  [State.FAILED]: []
};

export class FSM {
  state: State = State.AWAITING_FIRST_RESPONSE;
  readonly trail: State[] = [State.AWAITING_FIRST_RESPONSE];

  to(next: State) {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`illegal round transition ${this.state} -> ${next}`);
    }
    this.state = next;
    this.trail.push(next);
  }
}
