/**
 * GDB Console Output Grammars
 *
 * Best-effort readers for the few response shapes the frame walk relies on.
 * Anything that does not match is treated as absent, never as an error.
 */

export interface FrameDescription {
  /** -1 when no "#N" header was found */
  depth: number;
  function?: string;
  file?: string;
  /** -1 when no "at file:line" suffix was found */
  line: number;
  /** Text of the current source line as printed below the header */
  sourceText?: string;
}

// #1  0x000000000040056d in process (buf=0x4a2c040) at prog.c:12
const FRAME_HEADER = /^#(\d+)\s+(.*)$/;
const ADDRESS_IN_FUNCTION = /^0x[0-9a-fA-F]+ in (\S+) \(/;
const BARE_FUNCTION = /^(\S+) \(/;
const AT_LOCATION = / at (\S+):(\d+)\s*$/;
// 12	  process(buf);
const SOURCE_LINE = /^(\d+)\t(.*)$/;
const PRINT_RESULT = /^\$\d+ = (.*)$/;
const ASSIGNMENT = /^[A-Za-z_$][\w$.]*(?:\[[^\]]*\])* = /;

/**
 * Parse the response to `frame` (or `up`): header line, then the source line.
 */
export function parseFrameDescription(lines: string[]): FrameDescription {
  const description: FrameDescription = { depth: -1, line: -1 };

  const headerIndex = lines.findIndex((line) => FRAME_HEADER.test(line));
  if (headerIndex === -1) {
    return description;
  }

  const header = lines[headerIndex].match(FRAME_HEADER);
  if (!header) {
    return description;
  }
  description.depth = parseInt(header[1], 10);

  const rest = header[2];
  const fn = rest.match(ADDRESS_IN_FUNCTION) ?? rest.match(BARE_FUNCTION);
  if (fn) {
    description.function = fn[1];
  }

  const location = rest.match(AT_LOCATION);
  if (location) {
    description.file = location[1];
    description.line = parseInt(location[2], 10);
  }

  const source = lines[headerIndex + 1]?.match(SOURCE_LINE);
  if (source) {
    description.sourceText = source[2];
  }

  return description;
}

/**
 * True when GDB knows the file name but cannot show the text. It then prints
 * "prog.c: No such file or directory." or "in prog.c" in place of the source.
 */
export function isSourceUnavailable(sourceText: string | undefined, file: string | undefined): boolean {
  if (sourceText === undefined) return true;

  const text = sourceText.trim();
  if (/No such file or directory\.?$/.test(text)) return true;
  if (file === undefined) return false;

  return text === file || text === `in ${file}`;
}

/**
 * Top-level "name = value" lines of an `info args` / `info locals` response.
 * Continuation lines of multi-line values are indented and dropped.
 */
export function topLevelAssignments(lines: string[]): string[] {
  return lines.filter((line) => ASSIGNMENT.test(line));
}

/**
 * Value printed by `print`, or undefined when evaluation failed
 */
export function parsePrintResult(lines: string[]): string | undefined {
  for (const line of lines) {
    const match = line.match(PRINT_RESULT);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * Response lines without the trailing prompt
 */
export function stripPrompt(lines: string[], prompt: string): string[] {
  const last = lines[lines.length - 1];
  if (last !== undefined && last.endsWith(prompt)) {
    const before = last.slice(0, -prompt.length);
    return before.length > 0 ? [...lines.slice(0, -1), before] : lines.slice(0, -1);
  }
  return lines;
}

/**
 * A listed source line without its "N\t" prefix
 */
export function sourceText(listedLine: string): string {
  const match = listedLine.match(SOURCE_LINE);
  return match ? match[2] : listedLine;
}
