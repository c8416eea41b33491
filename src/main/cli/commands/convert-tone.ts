/**
 * @file convert-tone.ts - Tone conversion command
 * @description Rewrites text in one tone without retrieval
 * @depends commander, chalk, RagService
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { fail, interruptSignal, withEngine } from '../utils/engine';
import { Logger } from '../utils/logger';
import { renderStream } from '../utils/stream';

interface ConvertToneCommandOptions {
  tone?: string;
  stream: boolean;
  userDescription?: string;
  userMsg?: string;
  raw: boolean;
}

export function createConvertToneCommand(): Command {
  const command = new Command('convert-tone');

  command
    .description('Rewrite text in a tone (default child_friendly)')
    .argument('<text>', 'Text to rewrite')
    .option(
      '-t, --tone <name>',
      'child_friendly, elder_friendly, professional_friendly or casual_friendly'
    )
    .option('--no-stream', 'Wait for the whole rewrite')
    .option('-d, --user-description <text>', 'Description of the visitor')
    .option('-m, --user-msg <text>', 'The visitor message the text answers')
    .option('--raw', 'Print END_FLAG / ERROR: lines after the tokens', false)
    .action(async (text: string, options: ConvertToneCommandOptions) => {
      const interrupt = interruptSignal();
      const request = {
        text,
        tone: options.tone,
        userDescription: options.userDescription,
        userMessage: options.userMsg,
      };

      try {
        // Nothing here reads the index
        await withEngine(
          async ({ rag }) => {
            if (!options.stream) {
              const result = await rag.convertTone({ ...request, stream: false }, interrupt.signal);
              Logger.success(`Converted to ${chalk.cyan(result.tone)}`);
              console.log(result.convertedText);
              return;
            }

            const outcome = await renderStream(rag.convertTone(request, interrupt.signal), {
              raw: options.raw,
            });
            if (outcome !== 'end') {
              process.exitCode = 1;
            }
          },
          { skipInitialize: true }
        );
      } catch (error) {
        fail(error);
      } finally {
        interrupt.dispose();
      }
    });

  return command;
}
