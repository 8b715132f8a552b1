/**
 * Session Configuration
 *
 * Built once at startup, validated, and passed to the controller.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const sessionConfigSchema = z.object({
  /** Program run under the analyzer */
  program: z.string().min(1, 'program is required'),
  programArgs: z.array(z.string()).default([]),
  /** Number of the first error that gets a debug session */
  firstError: z.number().int().positive().default(1),
  /** Idle timeout for each debugger response, in ms */
  timeoutMs: z.number().int().positive().default(30000),
  /** Debugger commands sent after the built-in setup, before attaching */
  setupCommands: z.array(z.string()).default([]),
  /** Hand the debugger to the user instead of collecting a report */
  interactive: z.boolean().default(false),
  verbosity: z.number().int().min(0).max(3).default(0),
  /** Report destinations; "-" is stdout */
  outputs: z.array(z.string().min(1)).default(['-']),
  valgrindPath: z.string().min(1).default('valgrind'),
  gdbPath: z.string().min(1).default('gdb'),
  vgdbPath: z.string().min(1).default('vgdb'),
  /** Extra analyzer arguments placed before the program */
  toolArgs: z.array(z.string()).default([]),
  maxFrames: z.number().int().positive().default(64),
  /** Debugger page height; longer responses are cut at the pager */
  pageHeight: z.number().int().positive().default(100),
  valueWidth: z.number().int().min(8).default(80),
  pollIntervalMs: z.number().int().positive().default(50),
  maxBufferedLines: z.number().int().positive().default(10000),
});

export type SessionConfig = Readonly<z.infer<typeof sessionConfigSchema>>;

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

/**
 * Apply defaults and validate. Throws ConfigError listing every problem.
 */
export function resolveConfig(input: SessionConfigInput): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return Object.freeze(result.data);
}
