/**
 * Unit tests for session configuration
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/session/config.js';
import { ConfigError } from '../../src/session/errors.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig({ program: './prog' });

    expect(config).toMatchObject({
      program: './prog',
      programArgs: [],
      firstError: 1,
      timeoutMs: 30000,
      interactive: false,
      outputs: ['-'],
      valgrindPath: 'valgrind',
      gdbPath: 'gdb',
      vgdbPath: 'vgdb',
      maxFrames: 64,
      pageHeight: 100,
    });
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(resolveConfig({ program: './prog' }))).toBe(true);
  });

  it('keeps given values', () => {
    const config = resolveConfig({ program: './prog', firstError: 4, setupCommands: ['set print pretty on'] });

    expect(config.firstError).toBe(4);
    expect(config.setupCommands).toEqual(['set print pretty on']);
  });

  it('lists every problem', () => {
    let caught: unknown;
    try {
      resolveConfig({ program: '', firstError: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.kind).toBe('config');
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toBe('program: program is required');
      expect(caught.issues[1]).toMatch(/^firstError: /);
      expect(caught.message).toMatch(/^Invalid configuration:\n {2}program: program is required\n {2}firstError: /);
    }
  });

  it('rejects a value width too narrow for the ellipsis', () => {
    expect(() => resolveConfig({ program: './prog', valueWidth: 3 })).toThrow(ConfigError);
  });
});
