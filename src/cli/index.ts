#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerSessionsCommand } from './commands/sessions.js';
import { errorMessage } from '../shared/Logger.js';

// 版本號來自 package.json
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('chatledger')
  .description('Persist, compact and checkpoint AI chat sessions')
  .version(version);

registerSessionsCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
