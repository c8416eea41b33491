/**
 * @file stream.ts - Stream rendering
 * @description Writes a QueryStreamChunk stream to the terminal, either as plain text or in the
 *   line protocol (`END_FLAG` / `ERROR: <message>` after the tokens).
 * @depends chalk, shared/types/chat
 */

import chalk from 'chalk';
import {
  END_MARKER,
  ERROR_PREFIX,
  type QueryStreamChunk,
} from '../../../../shared/types/chat';

export interface StreamWriter {
  out(text: string): void;
  err(text: string): void;
}

export const processWriter: StreamWriter = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

/** How the stream finished; `aborted` means no terminal chunk arrived */
export type StreamOutcome = 'end' | 'error' | 'aborted';

export async function renderStream(
  stream: AsyncIterable<QueryStreamChunk>,
  options: { raw?: boolean; writer?: StreamWriter } = {}
): Promise<StreamOutcome> {
  const writer = options.writer ?? processWriter;
  let wroteTokens = false;
  const lineStart = (): string => (wroteTokens ? '\n' : '');

  for await (const chunk of stream) {
    switch (chunk.type) {
      case 'token':
        writer.out(chunk.content);
        wroteTokens = true;
        break;

      case 'end':
        writer.out(options.raw ? `${lineStart()}${END_MARKER}\n` : lineStart());
        return 'end';

      case 'error':
        if (options.raw) {
          writer.out(`${lineStart()}${ERROR_PREFIX}${chunk.error.message}\n`);
        } else {
          writer.out(lineStart());
          writer.err(`${chalk.red('✖')} ${chunk.error.message} ${chalk.gray(`(${chunk.error.code})`)}\n`);
        }
        return 'error';
    }
  }

  writer.out(lineStart());
  return 'aborted';
}
