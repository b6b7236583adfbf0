/**
 * HL7v2 ER7 (pipe-delimited) message parser.
 *
 * Produces the segment list described in ./types.ts. Delimiters are read
 * from MSH-1/MSH-2, so messages with non-default encoding characters parse
 * the same way. Escape sequences (\F\, \S\, \T\, \R\, \E\) are decoded
 * after splitting so an escaped delimiter never splits a value.
 */

import { SourceDataError } from "../mapping/errors";
import type { ComponentMap, FieldValue, HL7v2Message, HL7v2Segment } from "./types";

export interface EncodingCharacters {
  field: string;
  component: string;
  repetition: string;
  escape: string;
  subcomponent: string;
}

const SEGMENT_NAME = /^[A-Z][A-Z0-9]{2}$/;

export function parseMessage(raw: string): HL7v2Message {
  const lines = raw.split(/\r\n|\r|\n/).filter((line) => line.trim().length > 0);
  const header = lines[0];

  if (!header || !header.startsWith("MSH")) {
    throw new SourceDataError("Message must start with an MSH segment");
  }

  const encoding = readEncodingCharacters(header);

  return lines.map((line, index) =>
    index === 0 ? parseHeader(line, encoding) : parseSegment(line, index + 1, encoding),
  );
}

function readEncodingCharacters(header: string): EncodingCharacters {
  const field = header.charAt(3);
  if (!field) {
    throw new SourceDataError("MSH segment has no field separator");
  }

  const declared = header.slice(4).split(field)[0] ?? "";
  if (declared.length < 4) {
    throw new SourceDataError(
      `MSH-2 must declare at least 4 encoding characters, got "${declared}"`,
    );
  }

  const [component, repetition, escape, subcomponent] = declared;
  if (!component || !repetition || !escape || !subcomponent) {
    throw new SourceDataError(`Invalid MSH-2 encoding characters "${declared}"`);
  }

  return { field, component, repetition, escape, subcomponent };
}

function parseHeader(line: string, encoding: EncodingCharacters): HL7v2Segment {
  const parts = line.split(encoding.field);
  const fields: Record<number, FieldValue> = {
    1: encoding.field,
    2: parts[1] ?? "",
  };

  // parts[1] is MSH-2, so parts[i] holds MSH-(i+1)
  for (let i = 2; i < parts.length; i++) {
    const value = parseField(parts[i] ?? "", encoding);
    if (value !== undefined) fields[i + 1] = value;
  }

  return { segment: "MSH", fields };
}

function parseSegment(line: string, lineNumber: number, encoding: EncodingCharacters): HL7v2Segment {
  const parts = line.split(encoding.field);
  const name = parts[0] ?? "";

  if (!SEGMENT_NAME.test(name)) {
    throw new SourceDataError(`Invalid segment name "${name}" on line ${lineNumber}`);
  }

  const fields: Record<number, FieldValue> = {};
  for (let i = 1; i < parts.length; i++) {
    const value = parseField(parts[i] ?? "", encoding);
    if (value !== undefined) fields[i] = value;
  }

  return { segment: name, fields };
}

function parseField(raw: string, encoding: EncodingCharacters): FieldValue | undefined {
  if (raw === "") return undefined;

  const repetitions = raw.split(encoding.repetition);
  if (repetitions.length === 1) {
    return parseRepetition(raw, encoding);
  }

  return repetitions.map((repetition) => parseRepetition(repetition, encoding) ?? "");
}

function parseRepetition(raw: string, encoding: EncodingCharacters): FieldValue | undefined {
  if (raw === "") return undefined;

  const components = raw.split(encoding.component);
  if (components.length === 1) {
    return parseComponent(raw, encoding);
  }

  const result: ComponentMap = {};
  components.forEach((component, index) => {
    const value = parseComponent(component, encoding);
    if (value !== undefined) result[index + 1] = value;
  });
  return Object.keys(result).length > 0 ? result : undefined;
}

function parseComponent(raw: string, encoding: EncodingCharacters): FieldValue | undefined {
  if (raw === "") return undefined;

  const subcomponents = raw.split(encoding.subcomponent);
  if (subcomponents.length === 1) {
    return unescapeValue(raw, encoding);
  }

  const result: ComponentMap = {};
  subcomponents.forEach((subcomponent, index) => {
    if (subcomponent !== "") result[index + 1] = unescapeValue(subcomponent, encoding);
  });
  return Object.keys(result).length > 0 ? result : undefined;
}

function unescapeValue(value: string, encoding: EncodingCharacters): string {
  const esc = encoding.escape;
  if (!value.includes(esc)) return value;

  const replacements: Record<string, string> = {
    F: encoding.field,
    S: encoding.component,
    T: encoding.subcomponent,
    R: encoding.repetition,
    E: encoding.escape,
  };

  let result = "";
  let i = 0;
  while (i < value.length) {
    const char = value.charAt(i);
    if (char === esc) {
      const end = value.indexOf(esc, i + 1);
      const code = end > i ? value.slice(i + 1, end) : "";
      const replacement = replacements[code];
      if (replacement !== undefined) {
        result += replacement;
        i = end + 1;
        continue;
      }
    }
    result += char;
    i++;
  }
  return result;
}
