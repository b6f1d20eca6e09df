#!/usr/bin/env node
/**
 * Orunmila relay — Telex webhook bot answering questions on Yoruba history and culture.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command, InvalidArgumentError } from 'commander';
import { runServe } from './commands/serve.js';
import { loadConfig } from './config/config.js';
import { createApp } from './bootstrap.js';
import * as log from './utils/logger.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../package.json');
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

const program = new Command();

program
  .name('orunmila')
  .description('Telex webhook relay answering questions about Yoruba history and culture')
  .version(version);

program
  .command('serve')
  .description('Start the HTTP server (webhook, agent and message routes)')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .option('-d, --debug', 'Enable debug mode and logging')
  .action(async (opts: { port?: number; debug?: boolean }) => {
    await runServe(opts);
  });

program
  .command('ask <question...>')
  .description('Ask one question and print the answer')
  .option('-n, --name <name>', 'Name to address the question from')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (words: string[], opts: { name?: string; debug?: boolean }) => {
    const config = await loadConfig(opts.debug ? { server: { debug: true } } : undefined);
    const app = createApp(config);
    const answer = await app.generator.answer(words.join(' '), opts.name ? { name: opts.name } : undefined);
    console.log(answer);
  });

program.parseAsync().catch((err) => {
  log.error(`Fatal: ${log.errorMessage(err)}`);
  process.exit(1);
});
