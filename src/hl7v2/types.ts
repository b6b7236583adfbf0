/**
 * HL7v2 message model.
 *
 * A parsed message is an ordered list of segments. Field values keep the
 * wire structure: a plain string for a primitive, an index-keyed map for
 * components (and subcomponents inside them), and an array when the field
 * repeats. Indices are 1-based as in the HL7v2 standard (MSH-9 = fields[9]).
 */

export type ComponentMap = { [component: number]: FieldValue };

export type FieldValue = string | ComponentMap | FieldValue[];

export interface HL7v2Segment {
  segment: string;
  fields: Record<number, FieldValue>;
}

export type HL7v2Message = HL7v2Segment[];

export function isComponentMap(value: unknown): value is ComponentMap {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => /^\d+$/.test(key));
}

export function isSegment(value: unknown): value is HL7v2Segment {
  return (
    typeof value === "object" &&
    value !== null &&
    "segment" in value &&
    "fields" in value &&
    typeof value.segment === "string"
  );
}

/**
 * Read one component of a field value. A primitive standing where a
 * composite is expected is its own first component.
 */
export function getComponent(value: FieldValue | undefined, index: number): FieldValue | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) return getComponent(value[0], index);
  if (typeof value === "string") return index === 1 ? value : undefined;
  return value[index];
}
