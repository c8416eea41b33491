/**
 * @file query.ts - Query command
 * @description Streams one answer for a question
 * @depends commander, RagService
 */

import { Command, InvalidArgumentError } from 'commander';
import { fail, interruptSignal, withEngine } from '../utils/engine';
import { renderStream } from '../utils/stream';

interface QueryCommandOptions {
  session: string;
  history: boolean;
  context?: string;
  style: boolean;
  raw: boolean;
  topK?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function createQueryCommand(): Command {
  const command = new Command('query');

  command
    .description('Ask a question and stream the answer')
    .argument('<text>', 'Question text')
    .option('-s, --session <id>', 'Session id', 'default')
    .option('--no-history', 'Answer without the session history')
    .option('-c, --context <text>', 'Description of the visitor, skips the vision service')
    .option('--no-style', 'Return the grounded answer without a tone rewrite')
    .option('--raw', 'Print END_FLAG / ERROR: lines after the tokens', false)
    .option('-k, --top-k <n>', 'Passages to retrieve', parsePositiveInt)
    .action(async (text: string, options: QueryCommandOptions) => {
      const interrupt = interruptSignal();
      try {
        await withEngine(async ({ rag }) => {
          const outcome = await renderStream(
            rag.query(
              {
                text,
                sessionId: options.session,
                includeHistory: options.history,
                auxiliaryContext: options.context,
                applyStyleConversion: options.style,
                topK: options.topK,
              },
              interrupt.signal
            ),
            { raw: options.raw }
          );
          if (outcome !== 'end') {
            process.exitCode = 1;
          }
        });
      } catch (error) {
        fail(error);
      } finally {
        interrupt.dispose();
      }
    });

  return command;
}
