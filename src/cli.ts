#!/usr/bin/env node

import { Command } from 'commander';
import pc from 'picocolors';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { loadConfig, redactConfig } from './core/config.js';
import { initLogger } from './core/logger.js';
import { bootstrap } from './core/bootstrap.js';
import { describeError } from './core/errors.js';
import { startAgent } from './index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '..', 'package.json'), 'utf-8'));
    const version: unknown = typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
    return typeof version === 'string' ? version : '0.1.0';
  } catch {
    return '0.1.0';
  }
}

/** Print a failure in red and exit 1 instead of dumping a stack. */
async function run(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.error(pc.red(`Error: ${describeError(err)}`));
    process.exit(1);
  }
}

// ─── CLI ────────────────────────────────────────────────────────────

const program = new Command();

program
  .name('coralbridge')
  .description('Conversational agent for Slack and a Coral agent network')
  .version(getVersion());

program
  .command('start')
  .description('Run the agent in the foreground')
  .option('-c, --config <path>', 'Config file (default: $CORALBRIDGE_CONFIG or ./coralbridge.json)')
  .action(async (opts: { config?: string }) => {
    await run(async () => {
      await startAgent({ configPath: opts.config });
    });
  });

program
  .command('config')
  .description('Print the resolved configuration with secrets masked')
  .option('-c, --config <path>', 'Config file')
  .action(async (opts: { config?: string }) => {
    await run(async () => {
      initLogger({ level: 'warn', format: 'text' });
      const config = loadConfig({ path: opts.config });
      console.log(JSON.stringify(redactConfig(config), null, 2));
    });
  });

program
  .command('ask')
  .description('Run one orchestration cycle with local tools only and print the reply')
  .argument('<text...>', 'Message for the agent')
  .option('-c, --config <path>', 'Config file')
  .action(async (words: string[], opts: { config?: string }) => {
    await run(async () => {
      initLogger({ level: 'warn', format: 'text' });
      const loaded = loadConfig({ path: opts.config });
      const config = { ...loaded, logs: { ...loaded.logs, level: process.env.LOG_LEVEL ?? 'warn' } };
      const agent = await bootstrap(config, { localOnly: true });
      try {
        const outcome = await agent.handle(
          { conversationKey: 'cli', sender: 'cli', text: words.join(' '), surface: 'cli' },
          { send: async reply => { console.log(reply); } },
        );
        const color = outcome.status === 'answered' ? pc.green : pc.yellow;
        console.error(pc.dim(`[${color(outcome.status)} after ${outcome.rounds} round(s)]`));
      } finally {
        await agent.shutdown();
      }
    });
  });

await program.parseAsync();
