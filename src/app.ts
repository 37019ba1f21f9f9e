import Fastify, { type FastifyInstance } from 'fastify';
import websocket from '@fastify/websocket';
import { registerHttpRoutes, type HealthInfo } from './adapters/http-routes';
import { wsHandler } from './adapters/ws-handler';
import type { ConversationOrchestrator } from './orchestrator/conversation';

export type AppDeps = {
  orchestrator: ConversationOrchestrator;
  health: HealthInfo;
  // fastify's own request logging
  requestLogging?: boolean;
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const server = Fastify({ logger: deps.requestLogging ?? false });
  await server.register(websocket);

  server.get('/ws/chat', { websocket: true }, (socket, _req) => {
    wsHandler(socket, deps.orchestrator);
  });

  registerHttpRoutes(server, deps.orchestrator, deps.health);
  return server;
}
