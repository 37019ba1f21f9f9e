import { ConversationHistory } from './context';
import type { ConversationOrchestrator } from '../orchestrator/conversation';
import { createLogger } from '../observability/logger';

const logger = createLogger('session');

type SendJson = (payload: Record<string, unknown>) => Promise<void>;

/**
 * One chat connection. Holds the history the orchestrator reads from and runs one turn at a time.
 */
export class ChatSession {
  sessionId: string;
  sendJson: SendJson;

  private orchestrator: ConversationOrchestrator;
  private history = new ConversationHistory();
  private turnAbort: AbortController | null = null;
  private turnCount = 0;
  private ended = false;

  constructor(sessionId: string, sendJson: SendJson, orchestrator: ConversationOrchestrator) {
    this.sessionId = sessionId;
    this.sendJson = sendJson;
    this.orchestrator = orchestrator;
  }

  get busy() {
    return this.turnAbort !== null;
  }

  get turns() {
    return this.history.all();
  }

  async start() {
    logger.info('session start', { sid: this.sessionId });
    await this.sendJson({ type: 'ready', session_id: this.sessionId });
  }

  async handleMessage(text: string) {
    if (this.ended) return;
    if (this.turnAbort) {
      await this.sendJson({ type: 'error', code: 'BUSY', message: 'still answering the previous message' });
      return;
    }

    const abort = new AbortController();
    this.turnAbort = abort;
    this.turnCount += 1;
    try {
      const result = await this.orchestrator.handle(text, this.history.all(), abort.signal);
      // a stop during generation already told the client the session is over
      if (this.ended || abort.signal.aborted) return;
      this.history.append(result.turn);
      await this.sendJson({
        type: 'reply',
        text: result.reply,
        state: result.state,
        needs: result.needs,
        turn: this.turnCount
      });
    } finally {
      if (this.turnAbort === abort) this.turnAbort = null;
    }
  }

  async reset() {
    if (this.ended) return;
    this.turnAbort?.abort();
    this.history.clear();
    this.turnCount = 0;
    logger.info('session reset', { sid: this.sessionId });
    await this.sendJson({ type: 'reset' });
  }

  async stop(reason = 'stop') {
    if (this.ended) return;
    this.ended = true;
    logger.info('session stop requested', { sid: this.sessionId, reason, turns: this.history.length });
    // kills a running generation process
    this.turnAbort?.abort();
    try {
      await this.sendJson({ type: 'end', reason });
    } catch (err) {
      logger.debug('session end frame not delivered', {
        sid: this.sessionId,
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }
}
