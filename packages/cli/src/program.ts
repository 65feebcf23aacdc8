/**
 * wetlands command line
 */

import { Command } from 'commander';
import { VERSION } from '@wetlands/core';
import { ask, diagnose, documents, models, serve } from './commands/index.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('wetlands')
    .description('Chat with a library of wetland documents through Gemini function calling')
    .version(VERSION);

  program
    .command('serve')
    .description('Start the web app and HTTP API')
    .option('-p, --port <port>', 'Port to listen on (default: PORT or 8080)')
    .option('-H, --host <host>', 'Host to bind to (default: HOST or 127.0.0.1)')
    .option('--docs <dir>', 'Documents directory (default: DOCUMENTS_DIR or ./documents)')
    .action(serve);

  program
    .command('ask <question>')
    .description('Answer one question with citations')
    .option('--docs <dir>', 'Documents directory')
    .option('-v, --verbose', 'Show tool calls')
    .action(ask);

  program
    .command('documents')
    .description('List the documents in the knowledge base')
    .option('--docs <dir>', 'Documents directory')
    .action(documents);

  program
    .command('models')
    .description('List Gemini models that support generateContent')
    .option('-o, --output <file>', 'Also write the list to a file')
    .action(models);

  program
    .command('diagnose')
    .description('Check the API key and test candidate models')
    .option('-m, --model <model>', 'Model to test (repeatable)', collect, [])
    .action(diagnose);

  return program;
}
