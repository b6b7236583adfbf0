import { toSystemUrl } from "../v2-to-fhir/code-mapping/coding-systems";
import { convertDTMToDate, convertDTMToDateTime } from "../v2-to-fhir/datatypes/dtm-datetime";
import { toText, type BoundValue } from "./values";

export const VALUE_TYPES = ["STRING", "INTEGER", "DECIMAL", "BOOLEAN", "DATE", "DATE_TIME", "SYSTEM_URL"] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

/** Case-insensitive lookup, so `String` and `STRING` name the same type. */
export function toValueType(name: string): ValueType | undefined {
  const upper = name.trim().toUpperCase();
  return VALUE_TYPES.find((type) => type === upper);
}

const TRUE_WORDS = new Set(["TRUE", "Y", "YES", "1"]);
const FALSE_WORDS = new Set(["FALSE", "N", "NO", "0"]);

export interface ValueTypeOptions {
  /** IANA zone of DTM values that carry no offset; UTC when absent. */
  zoneId?: string;
}

/**
 * Coerce a value to a scalar of the given type. A value that does not
 * convert (an unparseable number, a malformed timestamp) becomes null and
 * is treated as absent.
 */
export function applyValueType(
  type: ValueType,
  value: BoundValue | null,
  options: ValueTypeOptions = {},
): BoundValue | null {
  if (type === "BOOLEAN" && typeof value === "boolean") return value;
  if ((type === "INTEGER" || type === "DECIMAL") && typeof value === "number") {
    return type === "INTEGER" ? Math.trunc(value) : value;
  }

  const text = toText(value)?.trim();
  if (!text) return null;

  switch (type) {
    case "STRING":
      return text;
    case "INTEGER": {
      if (!/^[+-]?\d+$/.test(text)) return null;
      return Number.parseInt(text, 10);
    }
    case "DECIMAL": {
      const parsed = Number(text);
      return Number.isFinite(parsed) ? parsed : null;
    }
    case "BOOLEAN": {
      const upper = text.toUpperCase();
      if (TRUE_WORDS.has(upper)) return true;
      if (FALSE_WORDS.has(upper)) return false;
      return null;
    }
    case "DATE":
      return convertDTMToDate(text) ?? null;
    case "DATE_TIME":
      return convertDTMToDateTime(text, options.zoneId) ?? null;
    case "SYSTEM_URL":
      return toSystemUrl(text) ?? null;
  }
}
