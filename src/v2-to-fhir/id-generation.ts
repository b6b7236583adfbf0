/**
 * Deterministic resource ids.
 *
 * `<kebab-kind>-<n>[-<control id>]`, where n counts instances of that kind
 * within one run starting at 1 and the control id comes from MSH-10:
 *
 *   Patient #1 of message "MSG001"       → patient-1-msg001
 *   MedicationRequest #2, no control id  → medication-request-2
 *
 * Running the same message twice produces the same ids.
 */

import { toKebabCase } from "../utils/string";

export type IdGenerator = (kind: string) => string;

export function generateId(kind: string, sequence: number, controlId?: string): string {
  const base = `${toKebabCase(kind)}-${sequence}`;
  const suffix = controlId ? toKebabCase(controlId) : "";
  return suffix ? `${base}-${suffix}` : base;
}

/** Per-run generator keeping one counter per resource kind. */
export function createIdGenerator(controlId?: string): IdGenerator {
  const counters = new Map<string, number>();
  return (kind) => {
    const sequence = (counters.get(kind) ?? 0) + 1;
    counters.set(kind, sequence);
    return generateId(kind, sequence, controlId);
  };
}
