/**
 * Report Data Model
 *
 * Structures produced while handling one memory error: what Valgrind
 * reported, and what GDB showed for each live frame.
 */

// One "at/by 0x...: fn (file:line)" entry from a Valgrind error block
export interface StackEntry {
  readonly function: string;
  readonly file: string;
  readonly line: number;
}

export interface ErrorReport {
  readonly message: string;
  /** Call order, innermost first */
  readonly stack: readonly StackEntry[];
  /** Process id from the `==<pid>==` prefix of the message line */
  readonly pid?: number;
}

// Frame as seen by the live debugger
export interface FrameInfo {
  /** 0 = innermost */
  depth: number;
  file?: string;
  /** -1 when the debugger reported no line */
  lineNumber: number;
  /** Present only when source text is available */
  sourceLine?: string;
  function?: string;
  /** "name = value" lines from the argument listing */
  arguments: string[];
  /** "name = value" lines from the locals listing, without repeats */
  locals: string[];
  /** Source window around the current line, as listed by the debugger */
  nearbyCode: string[];
  /** "expr = value" for each identifier or index expression in nearbyCode */
  nearbyVars: string[];
}

export function hasSource(frame: FrameInfo): frame is FrameInfo & { sourceLine: string } {
  return frame.sourceLine !== undefined;
}
