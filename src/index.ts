#!/usr/bin/env node

/**
 * vg-autopsy: run a program under Valgrind and, at each memory error,
 * attach GDB through vgdb to record the arguments, locals and values
 * around the faulting source line of every frame.
 */

import { createCli } from "./cli.js";

const cli = createCli();
await cli.parseAsync();
