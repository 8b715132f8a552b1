/**
 * GDB Tool Configuration
 *
 * GDB is driven through its console interface: one command per line, the
 * response ends when the "(gdb) " prompt reappears.
 */

import type { DebuggerTool } from './base.js';
import { commandExists } from './base.js';

export const gdbTool: DebuggerTool = {
  id: 'gdb',
  name: 'GDB',
  command: 'gdb',

  detect: async (command?: string) => commandExists(command ?? 'gdb'),

  installHint: `
GDB not found.

  - Ubuntu/Debian: apt install gdb
  - Fedora: dnf install gdb
  - Or pass its location with --gdb <path>
`.trim(),

  prompt: '(gdb) ',

  // Newer and older wording of the pager prompt
  pagerMarkers: ['Type <RET> for more', 'Type <return> to continue'],

  pagerQuitCommand: 'q',

  quitCommand: 'quit',

  buildArgs: (program: string) => ['--quiet', '--nx', program],

  setupCommands: (pageHeight: number) => [
    'set confirm off',
    'set width 0',
    `set height ${pageHeight}`,
    'set pagination on',
    'set non-stop off',
    'set mi-async off',
  ],

  attachCommand: (pid: number, relayCommand: string) => `target remote | ${relayCommand} --pid=${pid}`,
};
