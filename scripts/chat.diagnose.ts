import { config, pipelineSettings } from '../src/config';
import { GenerationClient, createGenerationProvider } from '../src/llm/llm-base';
import { ConversationOrchestrator } from '../src/orchestrator/conversation';
import { buildPrompt } from '../src/prompt/builder';
import { FileInstructionSource } from '../src/prompt/instructions';
import { matchedCrisisPhrases } from '../src/safety/crisis';
import { detectNeeds } from '../src/safety/needs';
import { validateInput } from '../src/safety/validator';

function usage(): never {
  console.error('usage: tsx scripts/chat.diagnose.ts "<message>" [--generate]');
  process.exit(2);
}

async function main() {
  const args = process.argv.slice(2);
  const generate = args.includes('--generate');
  const message = args.filter((a) => a !== '--generate').join(' ');
  if (!message) usage();

  const validation = validateInput(message, config.maxInputLength);
  console.log('validation:', validation.ok ? 'ok' : `rejected (${validation.reason})`);
  if (!validation.ok) return;

  const crisis = matchedCrisisPhrases(validation.text);
  console.log('crisis phrases:', crisis.length > 0 ? crisis.join(', ') : '(none)');
  const needs = Array.from(detectNeeds(validation.text));
  console.log('needs:', needs.length > 0 ? needs.join(', ') : '(none)');

  const instructions = new FileInstructionSource(config.systemPromptFile);
  const prompt = buildPrompt({
    baseInstructions: await instructions.load(),
    needs,
    history: [],
    currentText: validation.text,
    maxHistoryTurns: config.maxHistoryTurns,
    assistantLabel: config.assistantLabel
  });
  console.log(`\n--- prompt (${prompt.length} chars) ---\n${prompt}\n--- end prompt ---\n`);

  if (!generate) return;
  const orchestrator = new ConversationOrchestrator({
    settings: pipelineSettings(config),
    generator: new GenerationClient(createGenerationProvider(config)),
    instructions
  });
  const startedMs = Date.now();
  const result = await orchestrator.handle(message, []);
  console.log('state:', result.state, `(${Date.now() - startedMs} ms)`);
  console.log('trail:', result.trail.join(' -> '));
  console.log('reply:', result.reply);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
