import { buildApp } from './app';
import { config, pipelineSettings } from './config';
import { GenerationGate } from './core/generation-gate';
import { GenerationClient, createGenerationProvider } from './llm/llm-base';
import { logger } from './observability/logger';
import { checkDependencies, findFreePort } from './ops/preflight';
import { ConversationOrchestrator } from './orchestrator/conversation';
import { FileInstructionSource } from './prompt/instructions';

async function start() {
  logger.info('=== companion start ===');
  logger.info({ provider: config.generationProvider, DEBUG_COMPANION: process.env.DEBUG_COMPANION ?? '(unset)' }, 'companion config');

  const issues = await checkDependencies(config);
  for (const issue of issues) {
    if (issue.severity === 'error') logger.error('preflight', issue.message);
    else logger.warn('preflight', issue.message);
  }
  if (issues.some((i) => i.severity === 'error')) {
    throw new Error('setup incomplete, see preflight errors above');
  }

  const generator = new GenerationClient(
    createGenerationProvider(config),
    new GenerationGate(config.generationConcurrency)
  );
  const orchestrator = new ConversationOrchestrator({
    settings: pipelineSettings(config),
    generator,
    instructions: new FileInstructionSource(config.systemPromptFile)
  });

  const port = await findFreePort(config.host, config.port, config.portSearchSpan);
  if (port === null) {
    throw new Error(`no free port in ${config.port}-${config.port + config.portSearchSpan - 1}`);
  }

  const server = await buildApp({
    orchestrator,
    health: {
      provider: generator.name,
      maxInputLength: config.maxInputLength,
      maxHistoryTurns: config.maxHistoryTurns
    },
    requestLogging: true
  });
  await server.listen({ port, host: config.host });
  logger.info('server listening', { url: `http://${config.host}:${port}`, ws: `/ws/chat` });
}

start().catch((err) => {
  logger.error('failed to start server', err);
  process.exit(1);
});
