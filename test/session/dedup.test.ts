/**
 * Unit tests for report deduplication
 */

import { describe, it, expect } from 'vitest';
import { SignatureRegistry, stackSignature } from '../../src/session/dedup.js';
import type { FrameInfo } from '../../src/output/types.js';

function frame(depth: number, file: string | undefined, lineNumber: number, sourceLine?: string): FrameInfo {
  return { depth, file, lineNumber, sourceLine, arguments: [], locals: [], nearbyCode: [], nearbyVars: [] };
}

describe('stackSignature', () => {
  it('joins the location and source of each frame', () => {
    const signature = stackSignature([frame(0, 'prog.c', 6, '  a[10] = 0;'), frame(1, 'prog.c', 12, '  fill();')]);

    expect(signature).toBe('prog.c:6\n  a[10] = 0;\nprog.c:12\n  fill();\n');
  });

  it('ignores frames without source', () => {
    const withLibrary = stackSignature([
      frame(0, 'vg_replace_malloc.c', 299),
      frame(1, 'prog.c', 6, '  a[10] = 0;'),
      frame(2, undefined, -1),
    ]);

    expect(withLibrary).toBe(stackSignature([frame(1, 'prog.c', 6, '  a[10] = 0;')]));
  });

  it('ignores values, arguments and locals', () => {
    const first = frame(0, 'prog.c', 6, '  a[i] = 0;');
    const second = { ...frame(0, 'prog.c', 6, '  a[i] = 0;'), locals: ['i = 11'], nearbyVars: ['i = 11'] };

    expect(stackSignature([first])).toBe(stackSignature([second]));
  });

  it('is empty when no frame has source', () => {
    expect(stackSignature([frame(0, undefined, -1)])).toBe('');
  });
});

describe('SignatureRegistry', () => {
  it('claims a signature once', () => {
    const registry = new SignatureRegistry();

    expect(registry.claim('prog.c:6\n')).toBe(true);
    expect(registry.claim('prog.c:6\n')).toBe(false);
    expect(registry.has('prog.c:6\n')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('keeps different signatures apart', () => {
    const registry = new SignatureRegistry();

    registry.claim('prog.c:6\n');

    expect(registry.claim('prog.c:7\n')).toBe(true);
    expect(registry.size).toBe(2);
  });
});
