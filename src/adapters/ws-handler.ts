import { randomUUID } from 'crypto';
import { ChatSession } from '../core/session';
import type { ConversationOrchestrator } from '../orchestrator/conversation';
import { createLogger } from '../observability/logger';

const logger = createLogger('ws');

const nowMs = () => Date.now();

// The slice of a ws WebSocket the handler relies on.
export interface ChatSocket {
  send(data: string): void;
  close(): void;
  on(event: 'message', listener: (data: unknown) => void): this;
  on(event: 'close', listener: () => void): this;
}

type ClientMessage = {
  type?: unknown;
  session_id?: unknown;
  text?: unknown;
  reason?: unknown;
};

function decode(data: unknown): ClientMessage {
  const raw = typeof data === 'string' ? data : Buffer.isBuffer(data) ? data.toString('utf8') : String(data);
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('message is not a JSON object');
  }
  return {
    type: 'type' in parsed ? parsed.type : undefined,
    session_id: 'session_id' in parsed ? parsed.session_id : undefined,
    text: 'text' in parsed ? parsed.text : undefined,
    reason: 'reason' in parsed ? parsed.reason : undefined
  };
}

export function wsHandler(socket: ChatSocket, orchestrator: ConversationOrchestrator) {
  let session: ChatSession | null = null;

  const sendJson = async (payload: Record<string, unknown>) => {
    logger.debug('ws->client', payload.type, summarizePayload(payload));
    socket.send(JSON.stringify(payload));
  };

  const dispatch = async (msg: ClientMessage) => {
    const t = typeof msg.type === 'string' ? msg.type : undefined;

    if (t === 'start') {
      if (session) await session.stop('restart');
      const sid = typeof msg.session_id === 'string' && msg.session_id ? msg.session_id : randomUUID();
      logger.info('ws start', { sid });
      session = new ChatSession(sid, sendJson, orchestrator);
      await session.start();
      return;
    }

    if (t === 'message') {
      if (!session) {
        await sendJson({ type: 'error', code: 'NO_SESSION', message: 'send start first' });
        return;
      }
      // the validator decides what an acceptable message is; only the shape is checked here
      await session.handleMessage(typeof msg.text === 'string' ? msg.text : '');
      return;
    }

    if (t === 'reset') {
      if (session) await session.reset();
      return;
    }

    if (t === 'stop') {
      const reason = typeof msg.reason === 'string' ? msg.reason : 'stop';
      if (session) {
        logger.info('ws stop', { sid: session.sessionId, reason });
        await session.stop(reason);
      }
      socket.close();
      return;
    }

    if (t === 'ping') {
      await sendJson({ type: 'pong', ts_ms: nowMs() });
      return;
    }

    await sendJson({ type: 'error', code: 'UNKNOWN_TYPE', message: 'unsupported message type' });
  };

  socket.on('message', async (data: unknown) => {
    try {
      await dispatch(decode(data));
    } catch (e) {
      logger.error('ws handler error', e);
      try {
        await sendJson({ type: 'error', code: 'WS_HANDLER_ERROR', message: 'invalid websocket message' });
      } catch (sendErr) {
        logger.warn('ws error frame not delivered', sendErr);
      }
    }
  });

  socket.on('close', async () => {
    if (session) {
      logger.info('ws close', { sid: session.sessionId });
      await session.stop('ws_closed');
    }
  });
}

function summarizePayload(payload: Record<string, unknown>) {
  if (payload.type === 'reply' && typeof payload.text === 'string' && payload.text.length > 80) {
    return {
      ...payload,
      text: `${payload.text.slice(0, 80)}...`,
      text_len: payload.text.length
    };
  }
  return payload;
}
