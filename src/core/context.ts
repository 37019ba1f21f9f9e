export interface Turn {
  readonly userText: string;
  readonly botText: string;
}

export class ConversationHistory {
  private turns: Turn[] = [];

  append(turn: Turn) {
    this.turns.push(Object.freeze({ userText: turn.userText, botText: turn.botText }));
  }

  all(): readonly Turn[] {
    return this.turns;
  }

  get length() {
    return this.turns.length;
  }

  clear() {
    this.turns = [];
  }
}
