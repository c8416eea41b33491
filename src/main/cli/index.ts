#!/usr/bin/env node

/**
 * @file index.ts - docent CLI entry point
 * @description Question answering, tone conversion, interactive chat and index management
 * @depends commander, program
 */

import { createProgram } from './program';
import { Logger } from './utils/logger';

process.on('unhandledRejection', (reason) => {
  Logger.error(`Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
  process.exit(1);
});

await createProgram().parseAsync(process.argv);
