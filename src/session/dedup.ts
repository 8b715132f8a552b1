/**
 * Report Deduplication
 *
 * A crash is identified by the source lines of its stack. Frames without
 * source add nothing, so crashes differing only in library frames match.
 */

import { hasSource, type FrameInfo } from '../output/types.js';

export function stackSignature(frames: readonly FrameInfo[]): string {
  return frames
    .filter(hasSource)
    .map((frame) => `${frame.file ?? ''}:${frame.lineNumber}\n${frame.sourceLine}\n`)
    .join('');
}

export class SignatureRegistry {
  private seen = new Set<string>();

  /**
   * Record a signature. Returns false if it was already recorded.
   */
  claim(signature: string): boolean {
    if (this.seen.has(signature)) {
      return false;
    }
    this.seen.add(signature);
    return true;
  }

  has(signature: string): boolean {
    return this.seen.has(signature);
  }

  get size(): number {
    return this.seen.size;
  }
}
