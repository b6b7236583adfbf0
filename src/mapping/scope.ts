import { isSegment, type HL7v2Segment } from "../hl7v2/types";
import type { BoundValue } from "./values";

export const BASE_VALUE = "BASE_VALUE";

/** Resolves names no frame binds, e.g. resource kinds in the bundle. */
export type ScopeFallback = (name: string) => BoundValue | null;

// Segment occurrences live in the same chain under a key no variable name can take.
const SEGMENT_KEY_PREFIX = "#";

/**
 * Immutable chain of variable frames. Lookups walk innermost-first; a name
 * nobody binds reads as null. Extending never touches the parent, so one
 * parent can be shared by sibling branches and captured by deferred
 * evaluations as-is.
 */
export class Scope {
  private constructor(
    private readonly frame: ReadonlyMap<string, BoundValue | null>,
    private readonly parent: Scope | null,
    private readonly fallback: ScopeFallback | null,
  ) {}

  static root(bindings: Readonly<Record<string, BoundValue>> = {}, fallback?: ScopeFallback): Scope {
    return new Scope(new Map(Object.entries(bindings)), null, fallback ?? null);
  }

  extend(bindings: ReadonlyMap<string, BoundValue | null>): Scope {
    if (bindings.size === 0) return this;
    return new Scope(new Map(bindings), this, this.fallback);
  }

  bind(name: string, value: BoundValue | null): Scope {
    return new Scope(new Map([[name, value]]), this, this.fallback);
  }

  /**
   * Layer one repetition's base value. A segment also becomes the current
   * occurrence for its name, so `DG1.3` inside a DG1 loop reads this DG1.
   */
  withBaseValue(value: BoundValue): Scope {
    const frame = new Map<string, BoundValue | null>([[BASE_VALUE, value]]);
    if (isSegment(value)) {
      frame.set(SEGMENT_KEY_PREFIX + value.segment, value);
    }
    return new Scope(frame, this, this.fallback);
  }

  lookup(name: string): BoundValue | null {
    for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
      if (scope.frame.has(name)) {
        return scope.frame.get(name) ?? null;
      }
    }
    return this.fallback?.(name) ?? null;
  }

  isBound(name: string): boolean {
    for (let scope: Scope | null = this; scope !== null; scope = scope.parent) {
      if (scope.frame.has(name)) return true;
    }
    return false;
  }

  currentSegment(name: string): HL7v2Segment | null {
    const value = this.lookup(SEGMENT_KEY_PREFIX + name);
    return isSegment(value) ? value : null;
  }
}
