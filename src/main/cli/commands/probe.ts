/**
 * @file probe.ts - Health and warmup commands
 * @depends commander, chalk, RagService
 */

import chalk from 'chalk';
import { Command } from 'commander';
import type { WarmupStep } from '../../../../shared/types/chat';
import { fail, withEngine } from '../utils/engine';
import { Logger } from '../utils/logger';

const STEP_COLORS = {
  success: chalk.green,
  skipped: chalk.yellow,
  error: chalk.red,
} as const;

function printStep(label: string, step: WarmupStep): void {
  console.log(
    `  ${label}: ${STEP_COLORS[step.status](step.status)} ${step.message} ${chalk.gray(`(${step.timeMs} ms)`)}`
  );
}

export function createHealthCommand(): Command {
  const command = new Command('health');

  command
    .description('Report readiness and index size')
    .option('--json', 'Print the result as JSON', false)
    .action(async (options: { json: boolean }) => {
      try {
        await withEngine(async ({ rag }) => {
          const health = rag.health();
          if (options.json) {
            console.log(JSON.stringify(health));
            return;
          }
          Logger.success(`Status: ${health.status}`);
          Logger.field('RAG initialized', health.ragInitialized);
          Logger.field('Chunks', health.chunkCount);
          Logger.field('Timestamp', health.timestamp);
        });
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

export function createWarmupCommand(): Command {
  const command = new Command('warmup');

  command
    .description('Send one request to the embedding model and the LLM')
    .option('--json', 'Print the result as JSON', false)
    .action(async (options: { json: boolean }) => {
      try {
        await withEngine(async ({ rag }) => {
          const result = await rag.warmup();
          if (!result.overallSuccess) {
            process.exitCode = 1;
          }
          if (options.json) {
            console.log(JSON.stringify(result));
            return;
          }
          printStep('Embedding', result.embeddingModel);
          printStep('LLM', result.llmModel);
          if (result.overallSuccess) {
            Logger.success('Warmup complete');
          } else {
            Logger.error('Warmup failed');
          }
        });
      } catch (error) {
        fail(error);
      }
    });

  return command;
}
