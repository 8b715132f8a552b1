/**
 * Diagnostic Logging
 *
 * Leveled messages on stderr. Reports are written by the formatter, never here.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

// Minimum verbosity at which each level is printed
const LEVEL_VERBOSITY: Record<LogLevel, number> = {
  error: 0,
  warn: 0,
  info: 1,
  debug: 2,
  trace: 3,
};

export interface LoggerOptions {
  verbosity?: number;
  stream?: NodeJS.WritableStream;
  prefix?: string;
}

export class Logger {
  private verbosity: number;
  private stream: NodeJS.WritableStream;
  private prefix: string;

  constructor(options: LoggerOptions = {}) {
    this.verbosity = options.verbosity ?? 0;
    this.stream = options.stream ?? process.stderr;
    this.prefix = options.prefix ?? 'vg-autopsy';
  }

  setVerbosity(verbosity: number): void {
    this.verbosity = verbosity;
  }

  getVerbosity(): number {
    return this.verbosity;
  }

  enabled(level: LogLevel): boolean {
    return this.verbosity >= LEVEL_VERBOSITY[level];
  }

  log(level: LogLevel, message: string, details?: string): void {
    if (!this.enabled(level)) return;

    const head = `[${this.prefix}] ${level === 'info' ? '' : `${level}: `}${message}`;
    this.stream.write(details ? `${head}\n${indent(details)}\n` : `${head}\n`);
  }

  error(message: string, details?: string): void {
    this.log('error', message, details);
  }

  warn(message: string, details?: string): void {
    this.log('warn', message, details);
  }

  info(message: string, details?: string): void {
    this.log('info', message, details);
  }

  debug(message: string, details?: string): void {
    this.log('debug', message, details);
  }

  trace(message: string, details?: string): void {
    this.log('trace', message, details);
  }
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

export const logger = new Logger({
  verbosity: process.env.VG_AUTOPSY_DEBUG ? LEVEL_VERBOSITY.trace : 0,
});
