import type { FastifyInstance } from 'fastify';
import type { Turn } from '../core/context';
import type { ConversationOrchestrator } from '../orchestrator/conversation';

type ChatBody = {
  message: string;
  history?: Array<{ userText?: string; botText?: string }>;
};

const chatBodySchema = {
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string' },
    history: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          userText: { type: 'string' },
          botText: { type: 'string' }
        }
      }
    }
  }
} as const;

export type HealthInfo = {
  provider: string;
  maxInputLength: number;
  maxHistoryTurns: number;
};

export function registerHttpRoutes(server: FastifyInstance, orchestrator: ConversationOrchestrator, health: HealthInfo) {
  server.get('/healthz', async () => ({
    ok: true,
    provider: health.provider,
    max_input_length: health.maxInputLength,
    max_history_turns: health.maxHistoryTurns
  }));

  // Stateless variant of the socket protocol: the caller keeps the history and sends it along.
  server.post<{ Body: ChatBody }>('/api/chat', { schema: { body: chatBodySchema } }, async (request, reply) => {
    const history: Turn[] = (request.body.history ?? []).map((t) => ({
      userText: t.userText ?? '',
      botText: t.botText ?? ''
    }));

    const abort = new AbortController();
    // client went away before the answer was written
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) abort.abort();
    });

    const result = await orchestrator.handle(request.body.message, history, abort.signal);
    return {
      reply: result.reply,
      state: result.state,
      needs: result.needs,
      turn: result.turn
    };
  });
}
