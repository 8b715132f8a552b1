/**
 * Frame Inspection
 *
 * Collects arguments, locals, source context and nearby values for the
 * selected frame, and walks the stack outward one frame at a time.
 */

import type { FrameInfo } from '../output/types.js';
import { logger } from '../util/logger.js';
import type { DebuggerChannel } from './transport.js';
import {
  isSourceUnavailable,
  parseFrameDescription,
  parsePrintResult,
  stripPrompt,
  topLevelAssignments,
} from './parse.js';
import { collectNearbyExpressions } from './tokens.js';

const ARGS_COMMAND = 'info args';
const FRAME_COMMAND = 'frame';
const LOCALS_COMMAND = 'info locals';
const UP_COMMAND = 'up';

export interface FrameInspectorOptions {
  /** Frames collected before the walk gives up (default: 64) */
  maxFrames?: number;
  /** Width "expr = value" entries are cut to (default: 80) */
  valueWidth?: number;
  /** Debugger prompt, removed from listings (default: "(gdb) ") */
  prompt?: string;
}

export class FrameInspector {
  private channel: DebuggerChannel;
  private options: Required<FrameInspectorOptions>;

  constructor(channel: DebuggerChannel, options: FrameInspectorOptions = {}) {
    this.channel = channel;
    this.options = {
      maxFrames: options.maxFrames ?? 64,
      valueWidth: options.valueWidth ?? 80,
      prompt: options.prompt ?? '(gdb) ',
    };
  }

  /**
   * Inspect frames from the selected one outward. GDB refuses to go past the
   * outermost frame and keeps it selected, so the walk ends at the first
   * depth that does not increase; that repeated frame is not kept.
   */
  async walkStack(): Promise<FrameInfo[]> {
    const frames: FrameInfo[] = [];
    let lastDepth = -1;

    while (frames.length < this.options.maxFrames && this.channel.isConnected()) {
      const frame = await this.inspectFrame();
      if (frame.depth <= lastDepth) {
        break;
      }

      frames.push(frame);
      lastDepth = frame.depth;
      await this.channel.sendAndWait(UP_COMMAND);
    }

    if (frames.length >= this.options.maxFrames) {
      logger.debug(`Stack walk stopped at ${this.options.maxFrames} frames`);
    }

    return frames;
  }

  /**
   * Inspect the selected frame. Missing responses leave fields unset.
   */
  async inspectFrame(): Promise<FrameInfo> {
    const args = topLevelAssignments(await this.query(ARGS_COMMAND));
    const description = parseFrameDescription(await this.query(FRAME_COMMAND));

    const frame: FrameInfo = {
      depth: description.depth,
      file: description.file,
      lineNumber: description.line,
      function: description.function,
      arguments: args,
      locals: [],
      nearbyCode: [],
      nearbyVars: [],
    };

    if (isSourceUnavailable(description.sourceText, description.file)) {
      return frame;
    }
    frame.sourceLine = description.sourceText;

    frame.locals = [...new Set(topLevelAssignments(await this.query(LOCALS_COMMAND)))];

    if (description.file !== undefined && description.line >= 0) {
      frame.nearbyCode = await this.query(`list ${description.file}:${description.line}`);
    }

    const receiver = args.some((arg) => arg.startsWith('this = '));
    for (const expression of collectNearbyExpressions(frame.nearbyCode)) {
      const value = await this.evaluate(expression, receiver);
      if (value !== undefined) {
        frame.nearbyVars.push(value);
      }
    }

    return frame;
  }

  /**
   * "expr = value" for an expression, retried as a member of `this` when
   * the frame has a receiver and the bare name is unknown.
   */
  private async evaluate(expression: string, receiver: boolean): Promise<string | undefined> {
    const value = parsePrintResult(await this.channel.sendAndWait(`print ${expression}`));
    if (value !== undefined) {
      return this.truncate(`${expression} = ${value}`);
    }

    if (receiver) {
      const member = `this->${expression}`;
      const memberValue = parsePrintResult(await this.channel.sendAndWait(`print ${member}`));
      if (memberValue !== undefined) {
        return this.truncate(`${member} = ${memberValue}`);
      }
    }

    return undefined;
  }

  private async query(command: string): Promise<string[]> {
    return stripPrompt(await this.channel.sendAndWait(command), this.options.prompt);
  }

  private truncate(text: string): string {
    const width = this.options.valueWidth;
    return text.length > width ? `${text.slice(0, width - 3)}...` : text;
  }
}
