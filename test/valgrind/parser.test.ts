/**
 * Unit tests for the Valgrind error report parser
 */

import { describe, it, expect } from 'vitest';
import {
  classifyLine,
  extractPid,
  parseErrorReport,
  parseErrorReports,
} from '../../src/valgrind/parser.js';

const STARTUP = [
  '==4242== Memcheck, a memory error detector',
  '==4242== Copyright (C) 2002-2022, and GNU GPL\'d, by Julian Seward et al.',
  '==4242== Using Valgrind-3.22.0 and LibVEX; rerun with -h for copyright info',
  '==4242== Command: ./prog',
  '==4242== Parent PID: 4200',
  '==4242== ',
  '==4242== TO DEBUG THIS PROCESS USING GDB: start GDB like this',
  '==4242==   /path/to/gdb ./prog',
  '==4242== and then give GDB the following command',
  '==4242==   target remote | /usr/lib/valgrind/../../bin/vgdb --pid=4242',
  '==4242== --pid is optional if only one valgrind process is running',
  '==4242== ',
];

const INVALID_WRITE = [
  '==4242== Invalid write of size 4',
  '==4242==    at 0x400544: fill (prog.c:6)',
  '==4242==    by 0x400580: main (prog.c:12)',
  '==4242==  Address 0x4a2c068 is 0 bytes after a block of size 40 alloc\'d',
  '==4242==    at 0x4C2DB8F: malloc (vg_replace_malloc.c:299)',
  '==4242==    by 0x400537: main (prog.c:11)',
  '==4242== ',
];

const TRIGGER = '==4242== (action on error) vgdb me ... ';

describe('parseErrorReports', () => {
  it('parses the message and stack of one error', () => {
    const reports = parseErrorReports([...INVALID_WRITE, TRIGGER]);

    expect(reports).toEqual([
      {
        message: 'Invalid write of size 4',
        pid: 4242,
        stack: [
          { function: 'fill', file: 'prog.c', line: 6 },
          { function: 'main', file: 'prog.c', line: 12 },
          { function: 'malloc', file: 'vg_replace_malloc.c', line: 299 },
          { function: 'main', file: 'prog.c', line: 11 },
        ],
      },
    ]);
  });

  it('skips the startup banner', () => {
    const reports = parseErrorReports([...STARTUP, ...INVALID_WRITE, TRIGGER]);

    expect(reports.map((report) => report.message)).toEqual(['Invalid write of size 4']);
  });

  it('returns every error in the block in order', () => {
    const reports = parseErrorReports([
      '==4242== Conditional jump or move depends on uninitialised value(s)',
      '==4242==    at 0x400520: check (prog.c:3)',
      '==4242== ',
      ...INVALID_WRITE,
      TRIGGER,
    ]);

    expect(reports.map((report) => report.message)).toEqual([
      'Conditional jump or move depends on uninitialised value(s)',
      'Invalid write of size 4',
    ]);
    expect(reports[0].stack).toEqual([{ function: 'check', file: 'prog.c', line: 3 }]);
  });

  it('drops frames seen before any message', () => {
    const reports = parseErrorReports(['==4242==    at 0x400544: fill (prog.c:6)', ...INVALID_WRITE]);

    expect(reports).toHaveLength(1);
    expect(reports[0].stack[0]).toEqual({ function: 'fill', file: 'prog.c', line: 6 });
    expect(reports[0].stack).toHaveLength(4);
  });

  it('stops at the leak check suggestion', () => {
    const reports = parseErrorReports([
      '==4242== Rerun with --leak-check=full to see details of leaked memory',
      ...INVALID_WRITE,
    ]);

    expect(reports).toEqual([]);
  });

  it('stops at the attach trigger', () => {
    const reports = parseErrorReports([TRIGGER, ...INVALID_WRITE]);

    expect(reports).toEqual([]);
  });

  it('skips the line after the error limit notice', () => {
    const reports = parseErrorReports([
      '==4242== More than 10000000 total errors detected.  I\'m not reporting any more.',
      '==4242== Final error counts will be inaccurate.  Go fix your program!',
      ...INVALID_WRITE,
    ]);

    expect(reports.map((report) => report.message)).toEqual(['Invalid write of size 4']);
  });

  it('ignores headings, thread headers and the continuing notice', () => {
    const reports = parseErrorReports([
      '==4242== Continuing ...',
      '==4242== HEAP SUMMARY:',
      '==4242== Thread 2:',
      'plain program output',
    ]);

    expect(reports).toEqual([]);
  });

  it('skips frames without file and line', () => {
    const reports = parseErrorReports([
      '==4242== Invalid read of size 8',
      '==4242==    at 0x4E5A830: ??? (in /lib/libc.so.6)',
      '==4242==    by 0x400580: main (prog.c:12)',
    ]);

    expect(reports[0].stack).toEqual([{ function: 'main', file: 'prog.c', line: 12 }]);
  });

  it('gives the same result when parsed twice', () => {
    const block = [...STARTUP, ...INVALID_WRITE, TRIGGER];

    expect(parseErrorReports(block)).toEqual(parseErrorReports(block));
  });

  it('returns frozen reports', () => {
    const [report] = parseErrorReports(INVALID_WRITE);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.stack)).toBe(true);
  });
});

describe('parseErrorReport', () => {
  it('returns the first report', () => {
    expect(parseErrorReport(INVALID_WRITE)?.message).toBe('Invalid write of size 4');
  });

  it('returns undefined for a block without errors', () => {
    expect(parseErrorReport(STARTUP)).toBeUndefined();
  });
});

describe('classifyLine', () => {
  it('classifies each grammar', () => {
    expect(classifyLine(TRIGGER)).toEqual({ kind: 'terminate' });
    expect(classifyLine('==4242== Memcheck, a memory error detector')).toEqual({ kind: 'banner', skip: 5 });
    expect(classifyLine('==4242== Continuing ...')).toEqual({ kind: 'continuing' });
    expect(classifyLine('==4242== Thread 3:')).toEqual({ kind: 'thread' });
    expect(classifyLine('==4242==    by 0x400580: main (prog.c:12)')).toEqual({
      kind: 'frame',
      entry: { function: 'main', file: 'prog.c', line: 12 },
    });
    expect(classifyLine('==4242== Invalid free() / delete / delete[] / realloc()')).toEqual({
      kind: 'message',
      message: 'Invalid free() / delete / delete[] / realloc()',
      pid: 4242,
    });
    expect(classifyLine('==4242== ')).toEqual({ kind: 'ignored' });
  });
});

describe('extractPid', () => {
  it('reads the pid prefix', () => {
    expect(extractPid(TRIGGER)).toBe(4242);
  });

  it('returns undefined for unprefixed lines', () => {
    expect(extractPid('(gdb) ')).toBeUndefined();
  });
});
