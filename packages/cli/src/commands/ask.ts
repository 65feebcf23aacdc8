/**
 * ask: answer one question from the command line
 */

import { createRagChatbot, type Citation } from '@wetlands/core';
import { reportError, resolveSettings, type SettingsOverrides } from './settings.js';

export interface AskCommandOptions extends SettingsOverrides {
  /** Print tool calls as they happen */
  verbose?: boolean;
}

export function formatCitations(citations: readonly Citation[]): string[] {
  return citations.map((c, i) => `  ${i + 1}. ${c.source}, page ${c.page}${c.type === 'table' ? ' (table)' : ''}`);
}

export async function ask(question: string, options: AskCommandOptions = {}): Promise<void> {
  try {
    const built = await createRagChatbot(resolveSettings(options));
    if (!built.ok) {
      reportError(built.error);
      return;
    }

    let streamed = false;
    for await (const event of built.value.stream(question)) {
      switch (event.type) {
        case 'tool_start':
          if (options.verbose) console.error(`→ ${event.name} ${JSON.stringify(event.arguments)}`);
          break;
        case 'tool_end':
          if (options.verbose) console.error(`← ${event.name}: ${event.documents} passages (${event.durationMs}ms)`);
          break;
        case 'delta':
          streamed = true;
          process.stdout.write(event.content);
          break;
        case 'done':
          if (streamed) process.stdout.write('\n');
          else console.log(event.answer.answer);
          if (event.answer.citations.length > 0) {
            console.log('\nSources:');
            for (const line of formatCitations(event.answer.citations)) console.log(line);
          }
          break;
        case 'error':
          console.error(`❌ ${event.error.message}`);
          if (event.error.hint) console.error(`   ${event.error.hint}`);
          process.exitCode = 1;
          break;
      }
    }
  } catch (error) {
    reportError(error);
  }
}
