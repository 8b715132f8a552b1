/**
 * Valgrind Tool Configuration
 *
 * Runs the program under Valgrind with its embedded gdbserver enabled, so
 * Valgrind stops on each reported error and waits for a debugger.
 */

import type { AnalyzerLaunchOptions, AnalyzerTool, ToolConfig } from './base.js';
import { commandExists } from './base.js';

export const valgrindTool: AnalyzerTool = {
  id: 'valgrind',
  name: 'Valgrind',
  command: 'valgrind',

  detect: async (command?: string) => commandExists(command ?? 'valgrind'),

  installHint: `
Valgrind not found.

  - Ubuntu/Debian: apt install valgrind
  - Fedora: dnf install valgrind
  - Or pass its location with --valgrind <path>
`.trim(),

  buildArgs: (options: AnalyzerLaunchOptions) => [
    '--vgdb=yes',
    // Stop once this many errors have been shown, and on every later one
    `--vgdb-error=${options.firstError}`,
    '--error-limit=no',
    ...options.toolArgs,
    options.program,
    ...options.programArgs,
  ],
};

/**
 * vgdb relays the debugger's remote protocol to Valgrind's gdbserver.
 * It is a command run by the debugger, not by the session.
 */
export const vgdbTool: ToolConfig = {
  id: 'vgdb',
  name: 'vgdb',
  command: 'vgdb',

  detect: async (command?: string) => commandExists(command ?? 'vgdb'),

  installHint: 'vgdb ships with Valgrind; pass its location with --vgdb <path> if it is not on PATH.',
};
