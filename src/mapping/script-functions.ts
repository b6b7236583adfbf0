/**
 * Built-in scripted-value functions available to every specification.
 */

import { JSONPath } from "jsonpath-plus";
import { escapeHtml } from "../utils/string";
import { convertDTMToDateTime } from "../v2-to-fhir/datatypes/dtm-datetime";
import { ScriptEvaluationError } from "./errors";
import { navigate } from "./path-resolver";
import type { FragmentRecord } from "./resource-instance";
import type { ScriptFunction } from "./script-bridge";
import { applyValueType, toValueType } from "./value-types";
import { isEmptyValue, isResourceInstance, toText, type BoundValue } from "./values";

export interface CodeTableEntry {
  code: string;
  display?: string;
  system?: string;
}

/** Table name → source code → target coding. */
export type CodeTables = Readonly<Record<string, Readonly<Record<string, CodeTableEntry>>>>;

// Patient class (HL7 Table 0004) to Encounter.status when no discharge time is present
const PATIENT_CLASS_STATUS_MAP: Record<string, string> = {
  E: "in-progress",
  I: "in-progress",
  O: "in-progress",
  P: "planned",
  R: "in-progress",
  B: "in-progress",
  C: "in-progress",
  N: "unknown",
  U: "unknown",
};

function componentText(value: BoundValue | null, index: number): string | null {
  return toText(navigate(value, [index])[0] ?? null);
}

/**
 * CWE → join key: `code-system` (`C56.9-I10`), or the code alone when the
 * coding system is not valued.
 */
function buildIdentifierFromCwe(cwe: BoundValue | null): string | null {
  if (cwe === null) return null;
  const code = componentText(cwe, 1)?.trim();
  if (!code) return null;
  const system = componentText(cwe, 3)?.trim();
  return system ? `${code}-${system}` : code;
}

/**
 * Read one attribute of an already built resource through a JSONPath query
 * (`$.identifier[?(@.system=="urn:id:extID")].value`). An optional zone
 * applies to a DATE_TIME read without an offset.
 */
function extractAttribute(
  resource: BoundValue | null,
  path: BoundValue | null,
  type: BoundValue | null,
  zone: BoundValue | null = null,
): BoundValue | null {
  if (resource === null) return null;
  if (!isResourceInstance(resource)) {
    throw new ScriptEvaluationError("extractAttribute", "first argument must be a resource");
  }
  const jsonPath = toText(path);
  if (!jsonPath) {
    throw new ScriptEvaluationError("extractAttribute", "a JSONPath expression is required");
  }
  const typeName = toText(type) ?? "STRING";
  const valueType = toValueType(typeName);
  if (!valueType) {
    throw new ScriptEvaluationError("extractAttribute", `unknown value type ${typeName}`);
  }

  const matches: unknown = JSONPath({ path: jsonPath, json: resource.toJSON(), wrap: true });
  if (!Array.isArray(matches)) return null;

  for (const match of matches) {
    if (typeof match === "string" || typeof match === "number" || typeof match === "boolean") {
      return applyValueType(valueType, match, { zoneId: toText(zone) ?? undefined });
    }
  }
  return null;
}

/**
 * Encounter.status from PV1-45 (discharge), PV1-44 (admit) and PV1-2
 * (patient class). A discharge time always means finished.
 */
function encounterStatus(
  discharge: BoundValue | null,
  admit: BoundValue | null,
  patientClass: BoundValue | null,
): string {
  if (!isEmptyValue(discharge)) return "finished";

  const classCode = toText(patientClass)?.toUpperCase();
  const byClass =
    classCode && Object.hasOwn(PATIENT_CLASS_STATUS_MAP, classCode) ? PATIENT_CLASS_STATUS_MAP[classCode] : undefined;
  if (byClass) return byClass;

  return isEmptyValue(admit) ? "unknown" : "in-progress";
}

function instantOf(value: BoundValue | null, zoneId: string | undefined): number | null {
  const text = componentText(value, 1)?.trim();
  const dateTime = text ? convertDTMToDateTime(text, zoneId) : undefined;
  if (!dateTime) return null;
  const instant = Date.parse(dateTime);
  return Number.isNaN(instant) ? null : instant;
}

/**
 * Whole minutes from one DTM to another, read in `zone` when they carry no
 * offset. Null when either is missing or the end comes first.
 */
function durationMinutes(
  start: BoundValue | null,
  end: BoundValue | null,
  zone: BoundValue | null = null,
): number | null {
  const zoneId = toText(zone) ?? undefined;
  const from = instantOf(start, zoneId);
  const to = instantOf(end, zoneId);
  if (from === null || to === null || to < from) return null;
  return Math.round((to - from) / 60_000);
}

/** Narrative.div: the text escaped inside an XHTML div. */
function narrativeDiv(text: BoundValue | null): string | null {
  const content = toText(text)?.trim();
  if (!content) return null;
  return `<div xmlns="http://www.w3.org/1999/xhtml">${escapeHtml(content)}</div>`;
}

/** Join the non-empty text of every value after the separator. */
function concat(separator: BoundValue | null, ...values: (BoundValue | null)[]): string | null {
  const joined = values
    .map((value) => toText(value)?.trim())
    .filter((text): text is string => !!text)
    .join(toText(separator) ?? "");
  return joined.length > 0 ? joined : null;
}

// Only the table's own keys; `constructor` or `__proto__` in a message is an unknown code
function ownEntry(entries: Readonly<Record<string, CodeTableEntry>>, key: string): CodeTableEntry | undefined {
  return Object.hasOwn(entries, key) ? entries[key] : undefined;
}

function createCodeLookup(tables: CodeTables): ScriptFunction {
  return (table, code, attribute) => {
    const tableName = toText(table);
    if (!tableName) {
      throw new ScriptEvaluationError("codeLookup", "a table name is required");
    }
    const entries = Object.hasOwn(tables, tableName) ? tables[tableName] : undefined;
    if (!entries) {
      throw new ScriptEvaluationError("codeLookup", `unknown code table ${tableName}`);
    }

    const key = toText(code)?.trim();
    const entry = key ? ownEntry(entries, key) ?? ownEntry(entries, key.toUpperCase()) : undefined;
    if (!entry) return null;

    const coding: FragmentRecord = { code: entry.code };
    if (entry.system !== undefined) coding.system = entry.system;
    if (entry.display !== undefined) coding.display = entry.display;

    const attributeName = toText(attribute);
    if (attributeName === null) return coding;
    return Object.hasOwn(coding, attributeName) ? coding[attributeName] ?? null : null;
  };
}

export function createBuiltinFunctions(codeTables: CodeTables = {}): Record<string, ScriptFunction> {
  return {
    buildIdentifierFromCwe,
    extractAttribute,
    encounterStatus,
    concat,
    durationMinutes,
    narrativeDiv,
    codeLookup: createCodeLookup(codeTables),
  };
}
