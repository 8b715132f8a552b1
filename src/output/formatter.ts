/**
 * Report Formatter
 *
 * Renders crash reports as plain text and writes them to every destination.
 */

import type { ErrorReport, FrameInfo } from './types.js';

export interface FormatterOptions {
  /** Destinations for reports (default: stdout) */
  streams?: NodeJS.WritableStream[];
  /** Width of the rule line above each report (default: 72) */
  ruleWidth?: number;
}

export class ReportFormatter {
  private streams: NodeJS.WritableStream[];
  private ruleWidth: number;
  private reportsWritten: number = 0;

  constructor(options: FormatterOptions = {}) {
    this.streams = options.streams ?? [process.stdout];
    this.ruleWidth = options.ruleWidth ?? 72;
  }

  /**
   * Write the report for error number `index`
   */
  emitReport(index: number, report: ErrorReport, frames: readonly FrameInfo[]): void {
    this.write(this.renderReport(index, report, frames));
    this.reportsWritten++;
  }

  get count(): number {
    return this.reportsWritten;
  }

  renderReport(index: number, report: ErrorReport, frames: readonly FrameInfo[]): string {
    const lines = ['='.repeat(this.ruleWidth), `error ${index}: ${report.message}`];

    frames.forEach((frame, position) => {
      lines.push(...this.renderFrame(frame, position === 0));
    });

    return lines.join('\n') + '\n';
  }

  /**
   * Lines for one frame. The innermost frame is where the error happened,
   * the others are where the next inner frame was called.
   */
  renderFrame(frame: FrameInfo, innermost: boolean): string[] {
    const lines = [`${innermost ? 'error in' : 'called from'} ${this.describeFrame(frame)}`];

    if (frame.arguments.length > 0) {
      lines.push('  arguments:', ...frame.arguments.map((arg) => `    ${arg}`));
    }

    if (frame.locals.length > 0) {
      lines.push('  locals:', ...frame.locals.map((local) => `    ${local}`));
    }

    if (frame.sourceLine !== undefined) {
      lines.push(`  ${innermost ? '=>' : '->'} ${frame.lineNumber}: ${frame.sourceLine.trim()}`);
    }

    if (frame.nearbyVars.length > 0) {
      lines.push('  values:', ...frame.nearbyVars.map((value) => `    ${value}`));
    }

    return lines;
  }

  private describeFrame(frame: FrameInfo): string {
    const fn = frame.function ?? '??';
    if (frame.file === undefined) {
      return fn;
    }
    const location = frame.lineNumber >= 0 ? `${frame.file}:${frame.lineNumber}` : frame.file;
    return `${fn} (${location})`;
  }

  private write(text: string): void {
    for (const stream of this.streams) {
      stream.write(text);
    }
  }
}
