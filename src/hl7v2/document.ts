import { parseMessage } from "./parser";
import { getComponent, type FieldValue, type HL7v2Message, type HL7v2Segment } from "./types";

/**
 * Read-only view over a parsed message, the source document of one
 * conversion run.
 */
export interface SourceDocument {
  segments(name: string): readonly HL7v2Segment[];
}

export class Hl7v2Document implements SourceDocument {
  private readonly byName = new Map<string, HL7v2Segment[]>();

  constructor(readonly message: HL7v2Message) {
    for (const segment of message) {
      const list = this.byName.get(segment.segment);
      if (list) {
        list.push(segment);
      } else {
        this.byName.set(segment.segment, [segment]);
      }
    }
  }

  static fromString(raw: string): Hl7v2Document {
    return new Hl7v2Document(parseMessage(raw));
  }

  segments(name: string): readonly HL7v2Segment[] {
    return this.byName.get(name) ?? [];
  }

  /**
   * Message type from MSH-9 as `CODE-EVENT` ("ADT-A01"), the key used by
   * the message configuration. Null when MSH-9.1 or MSH-9.2 is missing.
   */
  messageType(): string | null {
    const msh9 = this.headerField(9);
    const code = textOf(getComponent(msh9, 1));
    const event = textOf(getComponent(msh9, 2));
    if (!code || !event) return null;
    return `${code}-${event}`;
  }

  /** MSH-10 Message Control ID */
  controlId(): string | undefined {
    return textOf(this.headerField(10));
  }

  private headerField(index: number): FieldValue | undefined {
    return this.segments("MSH")[0]?.fields[index];
  }
}

function textOf(value: FieldValue | undefined): string | undefined {
  const first = getComponent(value, 1);
  if (typeof first === "string") return first || undefined;
  if (first === undefined) return undefined;
  return textOf(first);
}
