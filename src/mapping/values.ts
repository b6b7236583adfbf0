import { isComponentMap, isSegment, type FieldValue, type HL7v2Segment } from "../hl7v2/types";
import { ResourceInstance, type Fragment, type FragmentRecord } from "./resource-instance";

/**
 * Anything a variable can hold: message data (field values, whole segments),
 * scalars, built resources, evaluated fragments, or lists of these.
 */
export type BoundValue =
  | FieldValue
  | number
  | boolean
  | HL7v2Segment
  | ResourceInstance
  | FragmentRecord
  | BoundValue[];

export function isResourceInstance(value: unknown): value is ResourceInstance {
  return value instanceof ResourceInstance;
}

export function isEmptyValue(value: BoundValue | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) {
    const items: readonly BoundValue[] = value;
    return items.every((item) => isEmptyValue(item));
  }
  if (typeof value === "object" && !isResourceInstance(value) && !isSegment(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/**
 * Text of a value the way guards and typed conversions see it: a composite
 * reads as its first component, a list as its first non-empty item, a
 * resource as its reference.
 */
export function toText(value: BoundValue | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value.length > 0 ? value : null;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    for (const item of value) {
      const text = toText(item);
      if (text !== null) return text;
    }
    return null;
  }
  if (isResourceInstance(value)) return value.reference;
  if (isSegment(value)) return null;
  if (isComponentMap(value)) return toText(value[1]);
  return null;
}

/** Flatten list nesting into one ordered sequence. */
export function toList(value: BoundValue | null | undefined): BoundValue[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) {
    const items: readonly BoundValue[] = value;
    return items.flatMap((item) => toList(item));
  }
  return [value];
}

/**
 * Convert an evaluated value into something that can live inside a
 * resource. Message composites collapse to their text, resources become
 * references, segments have no output form.
 */
export function toFragment(value: BoundValue | null | undefined): Fragment | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "string") return value.length > 0 ? value : null;
  if (isResourceInstance(value)) return { reference: value.reference };
  if (isSegment(value)) return null;
  if (Array.isArray(value)) {
    const items: readonly BoundValue[] = value;
    const fragments = items.map((item) => toFragment(item)).filter((item): item is Fragment => item !== null);
    return fragments.length > 0 ? fragments : null;
  }
  if (isComponentMap(value)) return toText(value);
  return Object.keys(value).length > 0 ? value : null;
}
