/**
 * Field-path resolution against the source document.
 *
 *   PV1.19.1 | PID.18.1 | MSH.7    first alternative with a value wins
 *   DG1                            every DG1 occurrence (or the current one)
 *   .3 / .3.1                      component of $BASE_VALUE
 *   $coding.1                      component of a bound variable
 *
 * A field path over a segment reads the occurrence the scope is iterating,
 * else the first occurrence in the message. Repeating fields yield every
 * repetition in order. Nothing found is an empty result, never an error;
 * only malformed syntax is (a broken specification).
 */

import type { SourceDocument } from "../hl7v2/document";
import { isSegment } from "../hl7v2/types";
import { SpecificationError } from "./errors";
import { BASE_VALUE, type Scope } from "./scope";
import { isEmptyValue, isResourceInstance, type BoundValue } from "./values";

export type PathAlternative =
  | { kind: "segment"; segment: string; indices: number[] }
  | { kind: "base"; indices: number[] }
  | { kind: "variable"; name: string; indices: number[] };

export interface ParsedPath {
  source: string;
  alternatives: PathAlternative[];
}

const SEGMENT_ALTERNATIVE = /^([A-Z][A-Z0-9]{2})((?:\.\d+){0,3})$/;
const BASE_ALTERNATIVE = /^((?:\.\d+){1,2})$/;
const VARIABLE_ALTERNATIVE = /^\$([A-Za-z_][A-Za-z0-9_]*)((?:\.\d+){0,2})$/;

const parsedPaths = new Map<string, ParsedPath>();

export function parsePath(source: string): ParsedPath {
  const cached = parsedPaths.get(source);
  if (cached) return cached;

  const parts = source.split("|").map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) {
    throw new SpecificationError(`Malformed path expression "${source}": empty alternative`);
  }

  const parsed: ParsedPath = { source, alternatives: parts.map((part) => parseAlternative(part, source)) };
  parsedPaths.set(source, parsed);
  return parsed;
}

function parseAlternative(part: string, source: string): PathAlternative {
  let match = SEGMENT_ALTERNATIVE.exec(part);
  if (match) {
    return { kind: "segment", segment: match[1] ?? "", indices: readIndices(match[2], source) };
  }

  match = BASE_ALTERNATIVE.exec(part);
  if (match) {
    return { kind: "base", indices: readIndices(match[1], source) };
  }

  match = VARIABLE_ALTERNATIVE.exec(part);
  if (match) {
    return { kind: "variable", name: match[1] ?? "", indices: readIndices(match[2], source) };
  }

  throw new SpecificationError(`Malformed path expression "${source}": cannot parse "${part}"`);
}

function readIndices(dotted: string | undefined, source: string): number[] {
  if (!dotted) return [];
  const indices = dotted.slice(1).split(".").map((index) => Number.parseInt(index, 10));
  if (indices.some((index) => index < 1)) {
    throw new SpecificationError(`Malformed path expression "${source}": indices start at 1`);
  }
  return indices;
}

export class PathResolver {
  constructor(private readonly document: SourceDocument) {}

  resolve(source: string, scope: Scope): BoundValue[] {
    const path = parsePath(source);

    for (const alternative of path.alternatives) {
      const values = this.resolveAlternative(alternative, scope).filter((value) => !isEmptyValue(value));
      if (values.length > 0) return values;
    }
    return [];
  }

  private resolveAlternative(alternative: PathAlternative, scope: Scope): BoundValue[] {
    switch (alternative.kind) {
      case "segment": {
        const current = scope.currentSegment(alternative.segment);
        if (alternative.indices.length === 0) {
          return current ? [current] : [...this.document.segments(alternative.segment)];
        }
        const segment = current ?? this.document.segments(alternative.segment)[0];
        return segment ? navigate(segment, alternative.indices) : [];
      }
      case "base":
        return navigate(scope.lookup(BASE_VALUE), alternative.indices);
      case "variable":
        return navigate(scope.lookup(alternative.name), alternative.indices);
    }
  }
}

/**
 * Walk field / component / subcomponent indices. Repetitions fan out, so
 * `PV1.7.1` over three repetitions of PV1-7 yields three values.
 */
export function navigate(value: BoundValue | null, indices: readonly number[]): BoundValue[] {
  if (value === null) return [];

  if (Array.isArray(value)) {
    const items: readonly BoundValue[] = value;
    return items.flatMap((item) => navigate(item, indices));
  }

  const [index, ...rest] = indices;
  if (index === undefined) return [value];

  if (isSegment(value)) {
    return navigate(value.fields[index] ?? null, rest);
  }
  if (typeof value === "string") {
    // a primitive is its own first component
    return index === 1 ? navigate(value, rest) : [];
  }
  if (typeof value === "object" && !isResourceInstance(value)) {
    return navigate(componentAt(value, index), rest);
  }
  return [];
}

function componentAt(value: object, index: number): BoundValue | null {
  const entry = Object.entries(value).find(([key]) => key === String(index));
  return entry ? toBound(entry[1]) : null;
}

function toBound(value: unknown): BoundValue | null {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toBound(item)).filter((item): item is BoundValue => item !== null);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).flatMap(([key, item]) => {
        const bound = toBound(item);
        return bound === null ? [] : [[key, bound]];
      }),
    );
  }
  return null;
}
