/**
 * Unit tests for Logger
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { Logger } from '../../src/util/logger.js';

function createCaptureStream(): { stream: Writable; getOutput: () => string } {
  let text = '';
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, getOutput: () => text };
}

describe('Logger', () => {
  it('prints warnings and errors at verbosity 0', () => {
    const { stream, getOutput } = createCaptureStream();
    const logger = new Logger({ stream });

    logger.error('cannot attach');
    logger.warn('slow debugger');
    logger.info('hidden');

    expect(getOutput()).toBe('[vg-autopsy] error: cannot attach\n[vg-autopsy] warn: slow debugger\n');
  });

  it('prints info without a level tag', () => {
    const { stream, getOutput } = createCaptureStream();
    const logger = new Logger({ stream, verbosity: 1 });

    logger.info('Error 1: Invalid read of size 4');
    logger.debug('hidden');

    expect(getOutput()).toBe('[vg-autopsy] Error 1: Invalid read of size 4\n');
  });

  it('indents details', () => {
    const { stream, getOutput } = createCaptureStream();
    const logger = new Logger({ stream, verbosity: 3, prefix: 'test' });

    logger.trace('gdb> frame', '#0  main () at prog.c:6\n(gdb) ');

    expect(getOutput()).toBe('[test] trace: gdb> frame\n    #0  main () at prog.c:6\n    (gdb) \n');
  });

  it('changes verbosity', () => {
    const logger = new Logger();

    logger.setVerbosity(2);

    expect(logger.getVerbosity()).toBe(2);
    expect(logger.enabled('debug')).toBe(true);
    expect(logger.enabled('trace')).toBe(false);
  });
});
