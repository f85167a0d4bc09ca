/**
 * Reference-counted ownership of parsed font faces.
 *
 * Every live face is tracked so it can be released at teardown even when a
 * caller leaks its fonts. A face leaves the tracker when its last reference is
 * released.
 */

import type { FontFace } from "./types";

export class TrackedFace {
  readonly face: FontFace;
  private refs = 0;
  private readonly onRelease: (tracked: TrackedFace) => void;

  constructor(face: FontFace, onRelease: (tracked: TrackedFace) => void) {
    this.face = face;
    this.onRelease = onRelease;
  }

  get refCount(): number {
    return this.refs;
  }

  retain(): void {
    this.refs++;
  }

  release(): void {
    if (this.refs === 0) return;
    this.refs--;
    if (this.refs === 0) {
      this.onRelease(this);
    }
  }
}

export class FaceTracker {
  private readonly faces = new Set<TrackedFace>();

  /** Start tracking a face. The returned handle has no references yet. */
  track(face: FontFace): TrackedFace {
    const tracked = new TrackedFace(face, (t) => this.untrack(t));
    this.faces.add(tracked);
    return tracked;
  }

  has(face: FontFace): boolean {
    for (const tracked of this.faces) {
      if (tracked.face === face) return true;
    }
    return false;
  }

  get size(): number {
    return this.faces.size;
  }

  /** Dispose every face still tracked, regardless of outstanding references */
  releaseAll(): void {
    for (const tracked of this.faces) {
      tracked.face.dispose();
    }
    this.faces.clear();
  }

  private untrack(tracked: TrackedFace): void {
    if (this.faces.delete(tracked)) {
      tracked.face.dispose();
    }
  }
}
