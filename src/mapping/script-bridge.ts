/**
 * Bridge to the scripted-value functions.
 *
 * A specification names a call as `functionName(arg, "literal", 3)`. Bare
 * identifiers (with or without `$`) are variables read from scope when the
 * call runs; quoted strings and numbers are literals. Functions are plain
 * synchronous TypeScript functions registered by name.
 */

import { ScriptEvaluationError, SpecificationError } from "./errors";
import type { BoundValue } from "./values";

export type ScriptArgumentSource =
  | { kind: "variable"; name: string }
  | { kind: "literal"; value: string | number };

export interface ScriptCall {
  source: string;
  functionName: string;
  args: ScriptArgumentSource[];
}

export interface ScriptArgument {
  name: string;
  value: BoundValue | null;
}

export type ScriptFunction = (...args: (BoundValue | null)[]) => BoundValue | null;

export interface ScriptBridge {
  /** @throws ScriptEvaluationError for an unknown function or a failing call */
  invoke(functionName: string, args: readonly ScriptArgument[]): BoundValue | null;
  has(functionName: string): boolean;
}

const CALL = /^([A-Za-z_][A-Za-z0-9_]*)\s*\((.*)\)$/s;
const IDENTIFIER = /^\$?[A-Za-z_][A-Za-z0-9_]*$/;
const NUMBER = /^-?\d+(\.\d+)?$/;

export function isScriptCall(text: string): boolean {
  return CALL.test(text.trim());
}

export function parseScriptCall(text: string): ScriptCall {
  const source = text.trim();
  const match = CALL.exec(source);
  if (!match) {
    throw new SpecificationError(`Malformed script call "${source}"`);
  }

  const functionName = match[1] ?? "";
  const body = (match[2] ?? "").trim();
  const args = body.length === 0 ? [] : splitArguments(body, source).map((arg) => parseArgument(arg, source));

  return { source, functionName, args };
}

/**
 * Split on commas that sit outside quoted strings. Backslash escapes inside
 * a string keep an embedded quote from closing it.
 */
export function splitArguments(body: string, source: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quote: string | null = null;

  for (let i = 0; i < body.length; i++) {
    const char = body.charAt(i);

    if (quote !== null) {
      current += char;
      if (char === "\\" && i + 1 < body.length) {
        current += body.charAt(i + 1);
        i++;
      } else if (char === quote) {
        quote = null;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
      current += char;
    } else if (char === ",") {
      parts.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  if (quote !== null) {
    throw new SpecificationError(`Malformed script call "${source}": unterminated string`);
  }
  parts.push(current.trim());
  return parts;
}

function parseArgument(text: string, source: string): ScriptArgumentSource {
  const first = text.charAt(0);
  if ((first === '"' || first === "'") && text.endsWith(first) && text.length >= 2) {
    return { kind: "literal", value: text.slice(1, -1).replace(/\\(.)/g, "$1") };
  }
  if (NUMBER.test(text)) {
    return { kind: "literal", value: Number(text) };
  }
  if (IDENTIFIER.test(text)) {
    return { kind: "variable", name: text.startsWith("$") ? text.slice(1) : text };
  }
  throw new SpecificationError(`Malformed script call "${source}": cannot parse argument "${text}"`);
}

/** Resolve a call's arguments through `lookup` and invoke it. */
export function invokeScriptCall(
  bridge: ScriptBridge,
  call: ScriptCall,
  lookup: (name: string) => BoundValue | null,
): BoundValue | null {
  const args = call.args.map(
    (arg, index): ScriptArgument =>
      arg.kind === "variable"
        ? { name: arg.name, value: lookup(arg.name) }
        : { name: `arg${index + 1}`, value: arg.value },
  );
  return bridge.invoke(call.functionName, args);
}

export class ScriptRegistry implements ScriptBridge {
  private readonly functions = new Map<string, ScriptFunction>();

  constructor(functions: Readonly<Record<string, ScriptFunction>> = {}) {
    for (const [name, fn] of Object.entries(functions)) {
      this.functions.set(name, fn);
    }
  }

  register(name: string, fn: ScriptFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  has(functionName: string): boolean {
    return this.functions.has(functionName);
  }

  invoke(functionName: string, args: readonly ScriptArgument[]): BoundValue | null {
    const fn = this.functions.get(functionName);
    if (!fn) {
      throw new ScriptEvaluationError(functionName, "unknown function");
    }

    try {
      return fn(...args.map((arg) => arg.value)) ?? null;
    } catch (error) {
      if (error instanceof ScriptEvaluationError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ScriptEvaluationError(functionName, message, { cause: error });
    }
  }
}
