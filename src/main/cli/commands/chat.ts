/**
 * @file chat.ts - Interactive chat command
 * @description REPL over one engine and one session. Lines starting with `/` are commands;
 *   Ctrl-C stops the current answer, or leaves when idle.
 * @depends readline, commander, chalk, RagService
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import { Command } from 'commander';
import type { IRagService } from '../../services/interfaces/IRagService';
import { fail, withEngine } from '../utils/engine';
import { Logger } from '../utils/logger';
import { renderStream } from '../utils/stream';

export const CHAT_COMMANDS = ['history', 'clear', 'close', 'context', 'help', 'exit'] as const;
export type ChatCommandName = (typeof CHAT_COMMANDS)[number];

export type ChatInput =
  | { kind: 'empty' }
  | { kind: 'message'; text: string }
  | { kind: 'command'; name: ChatCommandName; argument: string }
  | { kind: 'unknown'; name: string };

function isChatCommand(name: string): name is ChatCommandName {
  return CHAT_COMMANDS.some((command) => command === name);
}

export function parseChatInput(line: string): ChatInput {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'empty' };
  }
  if (!trimmed.startsWith('/')) {
    return { kind: 'message', text: trimmed };
  }

  const [head, ...rest] = trimmed.slice(1).split(/\s+/);
  const name = head.toLowerCase();
  if (name === 'quit') {
    return { kind: 'command', name: 'exit', argument: '' };
  }
  return isChatCommand(name)
    ? { kind: 'command', name, argument: rest.join(' ') }
    : { kind: 'unknown', name };
}

function showHelp(): void {
  console.log(chalk.yellow('Commands:'));
  console.log('  /history          Show this session');
  console.log('  /clear            Clear this session');
  console.log('  /close            Close this session');
  console.log('  /context <text>   Describe the visitor (empty to use the vision service)');
  console.log('  /exit             Leave');
}

class ChatSession {
  private readonly rl: readline.Interface;
  private current: AbortController | null = null;
  private auxiliaryContext: string | undefined;

  constructor(
    private readonly rag: IRagService,
    private readonly sessionId: string
  ) {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
    this.rl.on('SIGINT', () => {
      if (this.current) {
        this.current.abort();
      } else {
        this.rl.close();
      }
    });
  }

  private question(prompt: string): Promise<string | null> {
    return new Promise((resolve) => {
      const onClose = (): void => resolve(null);
      this.rl.once('close', onClose);
      this.rl.question(prompt, (answer) => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  async run(): Promise<void> {
    Logger.info(`Chatting as session ${chalk.cyan(this.sessionId)}. Type /help for commands.`);

    for (;;) {
      const line = await this.question(chalk.cyan('you> '));
      if (line === null) {
        break;
      }

      const input = parseChatInput(line);
      if (input.kind === 'command' && input.name === 'exit') {
        break;
      }
      await this.handle(input);
    }

    this.rl.close();
  }

  private async handle(input: ChatInput): Promise<void> {
    switch (input.kind) {
      case 'empty':
        return;
      case 'unknown':
        Logger.warning(`Unknown command /${input.name}`);
        return;
      case 'message':
        await this.ask(input.text);
        return;
      case 'command':
        await this.runCommand(input.name, input.argument);
        return;
    }
  }

  private async ask(text: string): Promise<void> {
    const controller = new AbortController();
    this.current = controller;
    try {
      process.stdout.write(chalk.green('docent> '));
      const outcome = await renderStream(
        this.rag.query(
          { text, sessionId: this.sessionId, auxiliaryContext: this.auxiliaryContext },
          controller.signal
        )
      );
      if (outcome === 'aborted') {
        Logger.warning('Stopped');
      }
    } finally {
      this.current = null;
    }
  }

  private async runCommand(name: ChatCommandName, argument: string): Promise<void> {
    switch (name) {
      case 'history': {
        const { history } = await this.rag.getHistory(this.sessionId);
        for (const message of history) {
          console.log(`${chalk.gray(message.role)}: ${message.content}`);
        }
        Logger.info(`${history.length} message(s)`);
        return;
      }
      case 'clear': {
        const { cleared } = await this.rag.clearHistory(this.sessionId);
        Logger.success(`Cleared ${cleared} message(s)`);
        return;
      }
      case 'close': {
        const result = await this.rag.closeSession(this.sessionId);
        Logger.success(`Closed session (${result.messagesCleared} message(s) dropped)`);
        return;
      }
      case 'context':
        this.auxiliaryContext = argument || undefined;
        Logger.info(argument ? `Visitor: ${argument}` : 'Using the vision service');
        return;
      case 'help':
      case 'exit':
        showHelp();
        return;
    }
  }
}

export function createChatCommand(): Command {
  const command = new Command('chat');

  command
    .description('Interactive chat in one session')
    .option('-s, --session <id>', 'Session id', 'default')
    .action(async (options: { session: string }) => {
      try {
        await withEngine(async ({ rag, ragInitialized }) => {
          if (!ragInitialized) {
            Logger.warning('No index loaded; answers will not cite the corpus');
          }
          await new ChatSession(rag, options.session).run();
        });
      } catch (error) {
        fail(error);
      }
    });

  return command;
}
