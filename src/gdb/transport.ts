/**
 * GDB Console Transport
 *
 * Command/response exchange with a debugger whose only framing is the
 * prompt it prints when it is ready again:
 * - one command per line on stdin
 * - stdout and stderr drained together, stderr first, one line at a time
 * - a response is complete when the text read ends with the prompt,
 *   when nothing arrives within the timeout, or at the line cap
 * - pagination prompts are answered inside the same call and never returned
 */

import type { ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { END_OF_STREAM, LineReader } from '../util/line-reader.js';
import { logger } from '../util/logger.js';

export interface DebuggerChannel {
  sendAndWait(command: string, timeoutMs?: number): Promise<string[]>;
  isConnected(): boolean;
}

export interface GdbTransportOptions {
  /** Idle timeout per response in ms (default: 30000) */
  timeout?: number;
  /** Prompt suffix that ends a response (default: "(gdb) ") */
  prompt?: string;
  /** Substrings identifying a pagination prompt */
  pagerMarkers?: string[];
  /** Sent to answer a pagination prompt (default: "q") */
  pagerQuitCommand?: string;
  /** Lines collected before a response is cut short (default: 10000) */
  maxLines?: number;
  /** Pagination prompts answered within one call (default: 32) */
  maxPagerFollowUps?: number;
}

type ReadPhase = 'response' | 'pager-follow-up';

export class GdbTransport extends EventEmitter implements DebuggerChannel {
  private process: ChildProcess;
  private stdout: LineReader;
  private stderr: LineReader;
  private options: Required<GdbTransportOptions>;
  private connectionLost: boolean = false;
  private closed: boolean = false;
  private processError: Error | null = null;

  constructor(process: ChildProcess, options: GdbTransportOptions = {}) {
    super();
    this.process = process;
    this.options = {
      timeout: options.timeout ?? 30000,
      prompt: options.prompt ?? '(gdb) ',
      pagerMarkers: options.pagerMarkers ?? ['Type <RET> for more', 'Type <return> to continue'],
      pagerQuitCommand: options.pagerQuitCommand ?? 'q',
      maxLines: options.maxLines ?? 10000,
      maxPagerFollowUps: options.maxPagerFollowUps ?? 32,
    };

    if (!process.stdout || !process.stdin || !process.stderr) {
      throw new Error('Process must have stdin, stdout and stderr');
    }

    this.stdout = new LineReader(process.stdout);
    this.stderr = new LineReader(process.stderr);

    // stdout closing is what marks the connection lost; output may still be
    // buffered when 'exit' arrives
    process.on('exit', (code, signal) => {
      this.emit('exit', code, signal);
    });

    process.on('error', (error: Error) => {
      this.processError = error;
      this.connectionLost = true;
      this.emit('processError', error);
    });

    // EPIPE after the debugger died; without a listener it would be thrown
    process.stdin.on('error', (error: Error) => {
      logger.debug(`gdb stdin: ${error.message}`);
      this.connectionLost = true;
      this.emit('disconnect');
    });
  }

  /**
   * Send a command and collect its response lines, prompt line included.
   * Never rejects on timeout: an idle debugger yields a partial or empty response.
   */
  async sendAndWait(command: string, timeoutMs: number = this.options.timeout): Promise<string[]> {
    this.write(command);
    const lines = await this.readResponse(timeoutMs);
    logger.trace(`gdb> ${command}`, lines.join('\n'));
    return lines;
  }

  /**
   * Collect output without sending anything, e.g. the banner and first prompt.
   */
  async waitForPrompt(timeoutMs: number = this.options.timeout): Promise<string[]> {
    return this.readResponse(timeoutMs);
  }

  /**
   * False once stdout closed, the process exited, or it failed to start
   */
  isConnected(): boolean {
    return !this.connectionLost && !this.closed;
  }

  /**
   * Error raised by the process itself (e.g. spawn failure), if any
   */
  getProcessError(): Error | null {
    return this.processError;
  }

  /**
   * Kill the debugger process
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.process.kill();
  }

  private write(command: string): void {
    const stdin = this.process.stdin;
    if (this.closed || this.connectionLost || !stdin?.writable) {
      this.connectionLost = true;
      return;
    }
    stdin.write(`${command}\n`);
  }

  private async readResponse(timeoutMs: number): Promise<string[]> {
    const lines: string[] = [];
    let tail = '';
    let phase: ReadPhase = 'response';
    let followUps = 0;

    while (lines.length < this.options.maxLines) {
      const diagnostic = this.stderr.next();
      if (typeof diagnostic === 'string') {
        lines.push(diagnostic);
        continue;
      }

      const item = this.stdout.next();
      if (item === END_OF_STREAM) {
        this.connectionLost = true;
        break;
      }

      let pagerSeen = false;
      if (typeof item === 'string') {
        const line = tail + item;
        tail = '';
        if (this.isPagerPrompt(line)) {
          pagerSeen = true;
        } else {
          lines.push(line);
        }
      } else {
        tail += this.stdout.takePartial();
        if (this.isPagerPrompt(tail)) {
          tail = '';
          pagerSeen = true;
        } else if (tail.endsWith(this.options.prompt)) {
          lines.push(tail);
          return lines;
        }
      }

      if (pagerSeen) {
        if (followUps >= this.options.maxPagerFollowUps) {
          logger.warn(`Giving up after ${followUps} pagination prompts`);
          break;
        }
        followUps++;
        phase = 'pager-follow-up';
        this.write(this.options.pagerQuitCommand);
        continue;
      }

      if (typeof item === 'string') {
        continue;
      }

      if (this.connectionLost) {
        break;
      }

      const active = await this.waitForActivity(timeoutMs);
      if (!active) {
        logger.debug(
          phase === 'pager-follow-up'
            ? 'No prompt after answering the pager'
            : `No response within ${timeoutMs}ms`
        );
        break;
      }
    }

    if (tail.length > 0) {
      lines.push(tail);
    }
    return lines;
  }

  private isPagerPrompt(text: string): boolean {
    return this.options.pagerMarkers.some((marker) => text.includes(marker));
  }

  /**
   * Wait until either channel has something to consume, the process goes away,
   * or timeoutMs passes. Partial stderr lines do not count.
   */
  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (this.stdout.hasPending(true) || this.stderr.hasPending(false)) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onActivity = () => {
        if (this.stdout.hasPending(true) || this.stderr.hasPending(false) || this.connectionLost) {
          finish(true);
        }
      };
      const timer = setTimeout(() => finish(false), timeoutMs);
      const finish = (active: boolean) => {
        clearTimeout(timer);
        this.stdout.off('activity', onActivity);
        this.stderr.off('activity', onActivity);
        this.off('exit', onActivity);
        this.off('processError', onActivity);
        this.off('disconnect', onActivity);
        resolve(active);
      };
      this.stdout.on('activity', onActivity);
      this.stderr.on('activity', onActivity);
      this.on('exit', onActivity);
      this.on('processError', onActivity);
      this.on('disconnect', onActivity);
    });
  }
}
