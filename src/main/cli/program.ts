/**
 * @file program.ts - docent command tree
 * @description Builds the commander program; the entry point only parses argv with it.
 * @depends commander, commands/*
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { createBuildIndexCommand } from './commands/build-index';
import { createChatCommand } from './commands/chat';
import { createConvertToneCommand } from './commands/convert-tone';
import { createHealthCommand, createWarmupCommand } from './commands/probe';
import { createQueryCommand } from './commands/query';

function readVersion(): string {
  try {
    const raw = readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8');
    return z.object({ version: z.string() }).parse(JSON.parse(raw)).version;
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('docent')
    .description('Retrieval-augmented docent: grounded answers in a tone fitted to the visitor')
    .version(readVersion(), '-v, --version')
    .addHelpText(
      'after',
      `
Sessions live in memory: use /history, /clear and /close inside \`docent chat\`.

Configuration:
  Stored with conf; DOCENT_* environment variables override it
  (DOCENT_LLM_PROVIDER, DOCENT_LLM_MODEL, DOCENT_LLM_API_KEY, DOCENT_EMBEDDING_MODEL,
   DOCENT_DB_PATH, DOCENT_CONTEXT_URL, ...).`
    );

  program.addCommand(createQueryCommand());
  program.addCommand(createConvertToneCommand());
  program.addCommand(createBuildIndexCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createWarmupCommand());
  program.addCommand(createChatCommand());

  return program;
}
