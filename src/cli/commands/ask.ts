import chalk from 'chalk';
import { exitWithError, openMemorySystem, requireProjectRoot } from '../session.js';
import { turnSummary } from '../ui.js';

interface AskOptions {
  model?: string;
  extract?: boolean;
  curate?: boolean;
}

export async function askCommand(prompt: string[], options: AskOptions): Promise<void> {
  const root = requireProjectRoot();
  const fullPrompt = prompt.join(' ');

  try {
    const { system, config } = await openMemorySystem(root, { model: options.model });

    try {
      const result = await system.orchestrator.respond(
        [{ role: 'user', content: fullPrompt }],
        {
          extract: options.extract !== false && config.memory.autoExtract,
          curate: options.curate !== false && config.memory.autoCurate,
          temperature: config.model.temperature,
          maxTokens: config.model.maxTokens,
        }
      );

      console.log(result.response);
      console.log();
      console.log(turnSummary(
        result.newMemories.length,
        result.deletedMemories.length,
        result.relevantMemories.length
      ));
    } finally {
      system.close();
    }
  } catch (error) {
    exitWithError(error);
  }
}
