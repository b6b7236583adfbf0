/**
 * Error taxonomy of the mapping engine.
 *
 * - ScriptEvaluationError: node-local, the node produces nothing and the run continues
 * - SpecificationError: fatal, the mapping definition is broken
 * - SourceDataError: fatal, the message is structurally corrupt
 *
 * A join that finds no candidate is not an error at all; it is reported as an
 * `unresolved-reference` diagnostic (see conversion-context.ts).
 */

export type MappingErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: MappingErrorContext): string {
  if (context === undefined || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export abstract class MappingError extends Error {
  readonly context?: MappingErrorContext;

  constructor(message: string, context?: MappingErrorContext, options?: ErrorOptions) {
    super(formatMessage(message, context), options);
    this.name = new.target.name;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

/** Location of an expression inside a specification, used in fatal errors. */
export interface SpecificationLocation {
  resourceKind?: string;
  attribute?: string;
}

export class SpecificationError extends MappingError {
  readonly resourceKind?: string;
  readonly attribute?: string;

  constructor(message: string, location: SpecificationLocation = {}, options?: ErrorOptions) {
    super(message, { ...location }, options);
    if (location.resourceKind !== undefined) this.resourceKind = location.resourceKind;
    if (location.attribute !== undefined) this.attribute = location.attribute;
  }

  /** Same error with the location filled in where it was still unknown. */
  locatedAt(location: SpecificationLocation): SpecificationError {
    if (this.resourceKind !== undefined && this.attribute !== undefined) {
      return this;
    }
    const message = this.message.replace(/ context=\{.*\}$/, "");
    return new SpecificationError(
      message,
      {
        resourceKind: this.resourceKind ?? location.resourceKind,
        attribute: this.attribute ?? location.attribute,
      },
      { cause: this.cause },
    );
  }
}

export class SourceDataError extends MappingError {}

export class ScriptEvaluationError extends MappingError {
  readonly functionName: string;

  constructor(functionName: string, message: string, options?: ErrorOptions) {
    super(`Script function "${functionName}" failed: ${message}`, undefined, options);
    this.functionName = functionName;
  }
}
