/**
 * Valgrind Error Report Parser
 *
 * Turns a block of Valgrind diagnostic lines into ErrorReports. Each line is
 * matched against a fixed list of grammars, first match wins:
 *
 *   skip       - banner text after a known header, discarded by count
 *   terminate  - leak-check suggestion or debugger hand-off, stops parsing
 *   banner     - header that starts a skip count
 *   continuing - "Continuing ..." after the debugger detaches
 *   thread     - "==pid== Thread N:"
 *   frame      - "==pid==    at|by 0xADDR: fn (file:line)"
 *   message    - "==pid== text" not indented and not ending with ':'
 *   ignored    - anything else (auxiliary stacks, summaries, blank lines)
 */

import type { ErrorReport, StackEntry } from '../output/types.js';

/** Printed by Valgrind when it stops on an error and waits for the debugger */
export const ATTACH_TRIGGER = '(action on error) vgdb me';

export const CONTINUING_MARKER = 'Continuing ...';

interface BannerRule {
  name: string;
  pattern: RegExp;
  /** Lines discarded after the header line */
  skip: number;
}

export const BANNER_RULES: readonly BannerRule[] = [
  // TO DEBUG THIS PROCESS USING GDB: start GDB like this / ... / --pid is optional ...
  { name: 'attach-instructions', pattern: /TO DEBUG THIS PROCESS USING GDB/, skip: 5 },
  // Memcheck, a memory error detector / Copyright / Using Valgrind-x.y / Command: / blank
  { name: 'tool-banner', pattern: /^==\d+== \w+, a [\w -]+ detector\s*$/, skip: 5 },
  // More than 10000000 total errors detected.  I'm not reporting any more.
  { name: 'error-limit', pattern: /More than \d+ (?:total|different) errors detected/, skip: 1 },
];

export const TERMINATORS: readonly RegExp[] = [
  /Rerun with --leak-check=full/,
  /\(action on error\) vgdb me/,
];

const THREAD_HEADER = /^==\d+== Thread \d+:\s*$/;
const FRAME_LINE = /^==\d+==\s+(?:at|by) 0x[0-9A-Fa-f]+: (.+) \((.+?):(\d+)\)\s*$/;
const MESSAGE_LINE = /^==(\d+)== (\S.*?)\s*$/;

export type LineKind =
  | { kind: 'terminate' }
  | { kind: 'banner'; skip: number }
  | { kind: 'continuing' }
  | { kind: 'thread' }
  | { kind: 'frame'; entry: StackEntry }
  | { kind: 'message'; message: string; pid: number }
  | { kind: 'ignored' };

/**
 * Classify one diagnostic line. Skip counting is the caller's job.
 */
export function classifyLine(line: string): LineKind {
  if (TERMINATORS.some((pattern) => pattern.test(line))) {
    return { kind: 'terminate' };
  }

  for (const rule of BANNER_RULES) {
    if (rule.pattern.test(line)) {
      return { kind: 'banner', skip: rule.skip };
    }
  }

  if (line.includes(CONTINUING_MARKER)) {
    return { kind: 'continuing' };
  }

  if (THREAD_HEADER.test(line)) {
    return { kind: 'thread' };
  }

  const frame = line.match(FRAME_LINE);
  if (frame) {
    return {
      kind: 'frame',
      entry: { function: frame[1], file: frame[2], line: parseInt(frame[3], 10) },
    };
  }

  const message = line.match(MESSAGE_LINE);
  if (message && !message[2].endsWith(':')) {
    return { kind: 'message', message: message[2], pid: parseInt(message[1], 10) };
  }

  return { kind: 'ignored' };
}

/**
 * Parse every error in a block, in order, up to the first terminator.
 * A frame seen before any message has no report to belong to and is dropped.
 */
export function parseErrorReports(lines: Iterable<string>): ErrorReport[] {
  const reports: { message: string; pid: number; stack: StackEntry[] }[] = [];
  let skipRemaining = 0;

  for (const line of lines) {
    if (skipRemaining > 0) {
      skipRemaining--;
      continue;
    }

    const parsed = classifyLine(line);
    if (parsed.kind === 'terminate') {
      break;
    }

    switch (parsed.kind) {
      case 'banner':
        skipRemaining = parsed.skip;
        break;
      case 'frame':
        reports[reports.length - 1]?.stack.push(parsed.entry);
        break;
      case 'message':
        reports.push({ message: parsed.message, pid: parsed.pid, stack: [] });
        break;
      default:
        break;
    }
  }

  return reports.map((report) =>
    Object.freeze({
      message: report.message,
      pid: report.pid,
      stack: Object.freeze(report.stack.map((entry) => Object.freeze(entry))),
    })
  );
}

/**
 * First error report in a block, if any
 */
export function parseErrorReport(lines: Iterable<string>): ErrorReport | undefined {
  return parseErrorReports(lines)[0];
}

/**
 * Process id from a `==<pid>==` prefixed line
 */
export function extractPid(line: string): number | undefined {
  const match = line.match(/^==(\d+)==/);
  return match ? parseInt(match[1], 10) : undefined;
}
