/**
 * Interactive Pass-through
 *
 * Hands the attached debugger to the user: each input line is sent as a
 * command and the response printed, until "quit" or end of input.
 */

import * as readline from 'node:readline';
import type { DebuggerChannel } from '../gdb/transport.js';

const EXIT_COMMANDS = new Set(['quit', 'q']);

/**
 * Terminal lines for every debugger session of a run. Lines typed ahead of
 * a "quit" stay queued for the next session.
 */
export class TerminalInput {
  private input: NodeJS.ReadableStream;
  private rl: readline.Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(input: NodeJS.ReadableStream = process.stdin) {
    this.input = input;
  }

  /**
   * Next line, or null at end of input
   */
  async nextLine(): Promise<string | null> {
    if (!this.lines) {
      this.rl = readline.createInterface({ input: this.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }

    const result = await this.lines.next();
    return result.done ? null : result.value;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }
}

export interface InteractiveOptions {
  /** Shared terminal; when absent one is opened on `input` for this call */
  terminal?: TerminalInput;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Printed before the first command */
  banner?: string;
}

export async function runInteractive(
  channel: DebuggerChannel,
  options: InteractiveOptions = {}
): Promise<number> {
  const terminal = options.terminal ?? new TerminalInput(options.input);
  const output = options.output ?? process.stdout;
  let commandsSent = 0;

  if (options.banner) {
    output.write(`${options.banner}\n`);
  }

  try {
    while (true) {
      const line = await terminal.nextLine();
      if (line === null) {
        break;
      }

      const command = line.trim();
      if (EXIT_COMMANDS.has(command)) {
        break;
      }

      const response = await channel.sendAndWait(command);
      commandsSent++;
      output.write(response.join('\n'));
      // The prompt line has no newline of its own
      if (response.length === 0 || !channel.isConnected()) {
        output.write('\n');
      }
      if (!channel.isConnected()) {
        break;
      }
    }
  } finally {
    if (!options.terminal) {
      terminal.close();
    }
  }

  return commandsSent;
}
