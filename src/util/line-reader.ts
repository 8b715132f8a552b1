/**
 * Line Reader
 *
 * Drains a child process stream in the background and turns it into a queue
 * of lines, so the writer never blocks on a full pipe. Consumers poll the
 * queue (or wait for activity) at their own pace. The end of the stream is
 * queued once as END_OF_STREAM, after any unterminated final line.
 */

import { EventEmitter } from 'node:events';
import { StringDecoder } from 'node:string_decoder';

export const END_OF_STREAM: unique symbol = Symbol('end-of-stream');

export type LineItem = string | typeof END_OF_STREAM;

/** Anything emitting 'data', 'end', 'close' and 'error' like a readable stream */
export type LineSource = NodeJS.EventEmitter;

export interface LineReaderOptions {
  /**
   * Unconsumed lines kept before the oldest ones are dropped (default: 10000).
   * The producer is never paused.
   */
  maxBufferedLines?: number;
}

export class LineReader extends EventEmitter {
  private queue: LineItem[] = [];
  private partial: string = '';
  private decoder = new StringDecoder('utf8');
  private ended: boolean = false;
  private droppedLines: number = 0;
  private maxBufferedLines: number;

  constructor(source: LineSource, options: LineReaderOptions = {}) {
    super();
    this.maxBufferedLines = options.maxBufferedLines ?? 10000;

    source.on('data', (chunk: Buffer | string) => this.push(chunk));
    source.on('end', () => this.finish());
    source.on('close', () => this.finish());
    source.on('error', (error: Error) => {
      this.emit('streamError', error);
      this.finish();
    });
  }

  /**
   * Number of queued items, END_OF_STREAM included
   */
  get length(): number {
    return this.queue.length;
  }

  /**
   * True once END_OF_STREAM has been queued
   */
  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Lines discarded because the queue was full
   */
  get dropped(): number {
    return this.droppedLines;
  }

  /**
   * Take the oldest queued item
   */
  next(): LineItem | undefined {
    return this.queue.shift();
  }

  /**
   * Last queued item without consuming it
   */
  peekLast(): LineItem | undefined {
    return this.queue[this.queue.length - 1];
  }

  /**
   * Take the unterminated text received after the last newline.
   * Used to see prompts, which are printed without a newline.
   */
  takePartial(): string {
    const text = this.partial;
    this.partial = '';
    return text;
  }

  /**
   * Whether anything can be consumed right now
   */
  hasPending(includePartial: boolean = true): boolean {
    return this.queue.length > 0 || (includePartial && this.partial.length > 0);
  }

  /**
   * Resolve true as soon as something is pending, false after timeoutMs.
   */
  waitForActivity(timeoutMs: number, includePartial: boolean = true): Promise<boolean> {
    if (this.hasPending(includePartial)) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onActivity = () => {
        if (this.hasPending(includePartial)) {
          finish(true);
        }
      };
      const timer = setTimeout(() => finish(false), timeoutMs);
      const finish = (active: boolean) => {
        clearTimeout(timer);
        this.off('activity', onActivity);
        resolve(active);
      };
      this.on('activity', onActivity);
    });
  }

  private push(chunk: Buffer | string): void {
    if (this.ended) return;

    const text = this.partial + (typeof chunk === 'string' ? chunk : this.decoder.write(chunk));
    const pieces = text.split('\n');
    this.partial = pieces.pop() ?? '';

    for (const piece of pieces) {
      this.enqueue(piece.endsWith('\r') ? piece.slice(0, -1) : piece);
    }

    this.emit('activity');
  }

  private finish(): void {
    if (this.ended) return;

    const rest = this.partial + this.decoder.end();
    this.partial = '';
    if (rest.length > 0) {
      this.enqueue(rest);
    }

    this.ended = true;
    this.queue.push(END_OF_STREAM);
    this.emit('activity');
  }

  private enqueue(line: string): void {
    if (this.queue.length >= this.maxBufferedLines) {
      this.queue.shift();
      this.droppedLines++;
    }
    this.queue.push(line);
  }
}
