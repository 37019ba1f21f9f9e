export enum TurnState {
  VALIDATING = 'VALIDATING',
  REJECTED = 'REJECTED',
  CLASSIFYING = 'CLASSIFYING',
  CRISIS_SHORT_CIRCUIT = 'CRISIS_SHORT_CIRCUIT',
  GENERATING = 'GENERATING',
  GENERATION_FAILED = 'GENERATION_FAILED',
  SANITIZING = 'SANITIZING',
  DONE = 'DONE'
}

export type TerminalState =
  | TurnState.REJECTED
  | TurnState.CRISIS_SHORT_CIRCUIT
  | TurnState.GENERATION_FAILED
  | TurnState.DONE;

const NEXT: Record<TurnState, readonly TurnState[]> = {
  [TurnState.VALIDATING]: [TurnState.REJECTED, TurnState.CLASSIFYING],
  [TurnState.CLASSIFYING]: [TurnState.CRISIS_SHORT_CIRCUIT, TurnState.GENERATING],
  [TurnState.GENERATING]: [TurnState.SANITIZING, TurnState.GENERATION_FAILED],
  [TurnState.SANITIZING]: [TurnState.DONE],
  [TurnState.REJECTED]: [],
  [TurnState.CRISIS_SHORT_CIRCUIT]: [],
  [TurnState.GENERATION_FAILED]: [],
  [TurnState.DONE]: []
};

export function isTerminal(state: TurnState): state is TerminalState {
  return NEXT[state].length === 0;
}

// One machine per turn; it only records where the turn went.
export class TurnFSM {
  state: TurnState = TurnState.VALIDATING;
  readonly trail: TurnState[] = [TurnState.VALIDATING];

  to(next: TurnState) {
    if (!NEXT[this.state].includes(next)) {
      throw new Error(`illegal turn transition ${this.state} -> ${next}`);
    }
    this.state = next;
    this.trail.push(next);
  }

  // unexpected errors end the turn from wherever it was
  fail() {
    if (isTerminal(this.state)) {
      throw new Error(`turn already ended in ${this.state}`);
    }
    this.state = TurnState.GENERATION_FAILED;
    this.trail.push(TurnState.GENERATION_FAILED);
  }
}
