/**
 * Loads YAML mapping specifications and compiles them into the node tree
 * of ./specification.ts.
 *
 * Raw YAML is checked against a zod schema first; everything the schema
 * cannot express (kind inference, descriptor syntax, guard syntax, where
 * `evaluateLater` may appear) is checked while compiling. Any problem is a
 * SpecificationError naming the specification and attribute.
 */

import { readdirSync, readFileSync } from "node:fs";
import { extname, join, relative, sep } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { conditionVariables, parseCondition } from "./condition";
import { SpecificationError, type SpecificationLocation } from "./errors";
import type { Scalar } from "./resource-instance";
import { isScriptCall, parseScriptCall } from "./script-bridge";
import type {
  ExpressionNode,
  NamedNode,
  NestedChildren,
  NodeSettings,
  ReferenceTarget,
  Specification,
  SpecificationSet,
  VariableDeclaration,
  VariableSource,
} from "./specification";
import { toValueType } from "./value-types";

const EXPRESSION_TYPES = ["path", "script", "resource", "reference", "nested", "constant"] as const;

type RawScalar = string | number | boolean;

interface RawNode {
  expressionType?: (typeof EXPRESSION_TYPES)[number];
  condition?: string;
  vars?: Map<string, RawVariable>;
  constants?: Map<string, RawScalar>;
  specs?: string;
  valueOf?: string;
  value?: RawScalar;
  type?: string;
  generateList?: boolean;
  evaluateLater?: boolean;
  required?: boolean;
  expressionsMap?: Map<string, RawNode>;
  expressions?: RawNode[];
}

type RawVariable = string | { value: RawScalar } | { nested: RawNode };

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

// `10:` reads as a number key
const KeySchema = z.union([z.string(), z.number()]).transform((key) => String(key));

/**
 * YAML mappings are read as Maps so that attributes, vars and map children
 * keep source order (a plain object moves integer-like keys first). A node's
 * own fixed fields are then checked as an object.
 */
function fieldsOf(value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

const RawVariableSchema: z.ZodType<RawVariable, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    fieldsOf,
    z.union([
      z.string().min(1),
      z.object({ value: ScalarSchema }).strict(),
      z.object({ nested: RawNodeSchema }).strict(),
    ]),
  ),
);

const RawNodeSchema: z.ZodType<RawNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    fieldsOf,
    z
      .object({
        expressionType: z.enum(EXPRESSION_TYPES).optional(),
        condition: z.string().min(1).optional(),
        vars: z.map(KeySchema, RawVariableSchema).optional(),
        constants: z.map(KeySchema, ScalarSchema).optional(),
        specs: z.string().min(1).optional(),
        valueOf: z.string().min(1).optional(),
        value: ScalarSchema.optional(),
        type: z.string().min(1).optional(),
        generateList: z.boolean().optional(),
        evaluateLater: z.boolean().optional(),
        required: z.boolean().optional(),
        expressionsMap: z.map(KeySchema, RawNodeSchema).optional(),
        expressions: z.array(RawNodeSchema).optional(),
      })
      .strict(),
  ),
);

const SPEC_FOLDER_PREFIX = /^(datatype|secondary|resource)\//;
const SUFFIX = /_\d+$/;
const FUNCTION_NAME = /^[a-z][A-Za-z0-9_]*$/;

/** `identifier_2` → `identifier` */
export function attributeName(key: string): string {
  return key.replace(SUFFIX, "");
}

class CompiledSpecificationSet implements SpecificationSet {
  constructor(private readonly specifications: ReadonlyMap<string, Specification>) {}

  loadSpecification(name: string): Specification {
    const specification = this.specifications.get(name);
    if (!specification) {
      throw new SpecificationError(`Undeclared specification "${name}"`);
    }
    return specification;
  }

  has(name: string): boolean {
    return this.specifications.has(name);
  }

  names(): string[] {
    return [...this.specifications.keys()];
  }
}

/**
 * Build a specification set from YAML texts keyed by specification name
 * (`resource/Patient`, `datatype/Identifier`).
 */
export function createSpecificationSet(sources: Readonly<Record<string, string>>): SpecificationSet {
  const specifications = new Map<string, Specification>();
  for (const [name, text] of Object.entries(sources)) {
    specifications.set(name, compileSpecification(name, text));
  }
  return new CompiledSpecificationSet(specifications);
}

/** Every `.yml` / `.yaml` file under `rootDir`, named by its relative path. */
export function loadSpecificationSet(rootDir: string): SpecificationSet {
  const sources: Record<string, string> = {};

  for (const file of listYamlFiles(rootDir)) {
    const name = relative(rootDir, file)
      .slice(0, -extname(file).length)
      .split(sep)
      .join("/");
    sources[name] = readFileSync(file, "utf-8");
  }

  return createSpecificationSet(sources);
}

function listYamlFiles(dir: string): string[] {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  return entries.flatMap((entry) => {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) return listYamlFiles(path);
    const extension = extname(entry.name);
    return extension === ".yml" || extension === ".yaml" ? [path] : [];
  });
}

export function compileSpecification(name: string, text: string): Specification {
  let document: unknown;
  try {
    document = parseYaml(text, { mapAsMap: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SpecificationError(
      `Specification "${name}" is not valid YAML: ${message}`,
      { resourceKind: name },
      { cause: error },
    );
  }

  if (!(document instanceof Map)) {
    throw new SpecificationError(`Specification "${name}" must be a mapping of attributes`, { resourceKind: name });
  }

  const isResource = name.startsWith("resource/");
  let resourceType: string | undefined;
  const members: NamedNode[] = [];

  const entries: [unknown, unknown][] = [...document.entries()];
  for (const [rawKey, raw] of entries) {
    if (typeof rawKey !== "string" && typeof rawKey !== "number") {
      throw new SpecificationError(`Specification "${name}" has a non-scalar attribute key`, { resourceKind: name });
    }
    const key = String(rawKey);
    const location: SpecificationLocation = { resourceKind: name, attribute: key };

    if (key === "resourceType") {
      if (typeof raw !== "string") {
        throw new SpecificationError(`resourceType of "${name}" must be a string`, location);
      }
      resourceType = raw;
      continue;
    }
    if (key === "id") {
      throw new SpecificationError(
        `Specification "${name}" declares "id"; ids are assigned when a resource is created`,
        location,
      );
    }

    const parsed = RawNodeSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
      throw new SpecificationError(`Invalid expression in "${name}": ${issues}`, location);
    }

    members.push({
      key,
      attribute: attributeName(key),
      node: compileNode(parsed.data, location, isResource),
    });
  }

  if (isResource && resourceType === undefined) {
    resourceType = name.slice("resource/".length);
  }

  return resourceType === undefined ? { name, members } : { name, resourceType, members };
}

function compileNode(raw: RawNode, location: SpecificationLocation, allowDeferral: boolean): ExpressionNode {
  if (raw.evaluateLater && !allowDeferral) {
    throw new SpecificationError(
      "evaluateLater is only allowed on attributes of a resource specification",
      location,
    );
  }

  const settings = compileSettings(raw, location);
  const kind = raw.expressionType ?? inferKind(raw);

  switch (kind) {
    case "constant": {
      if (raw.value === undefined) {
        throw new SpecificationError("A constant expression needs a value", location);
      }
      return { ...settings, kind, value: raw.value };
    }
    case "path":
      return { ...settings, kind, path: requireValueOf(raw, location) };
    case "script":
      return { ...settings, kind, call: withLocation(location, () => parseScriptCall(requireValueOf(raw, location))) };
    case "resource":
      return { ...settings, kind, specificationName: requireValueOf(raw, location) };
    case "reference":
      return { ...settings, kind, target: referenceTarget(raw.valueOf, location) };
    case "nested":
      return { ...settings, kind, children: compileChildren(raw, location) };
  }
}

function inferKind(raw: RawNode): ExpressionNode["kind"] {
  if (raw.value !== undefined) return "constant";
  if (raw.expressionsMap !== undefined || raw.expressions !== undefined) return "nested";
  const valueOf = raw.valueOf?.trim() ?? "";
  if (SPEC_FOLDER_PREFIX.test(valueOf)) return "resource";
  if (valueOf.includes("(")) return "script";
  return "path";
}

function requireValueOf(raw: RawNode, location: SpecificationLocation): string {
  if (raw.valueOf === undefined) {
    throw new SpecificationError("Expression needs a valueOf", location);
  }
  return raw.valueOf.trim();
}

function referenceTarget(valueOf: string | undefined, location: SpecificationLocation): ReferenceTarget {
  if (valueOf === undefined) return { kind: "base" };

  const trimmed = valueOf.trim();
  if (/^\$[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
    return { kind: "variable", name: trimmed.slice(1) };
  }
  const resource = /^resource\/([A-Za-z][A-Za-z0-9]*)$/.exec(trimmed);
  if (resource?.[1]) {
    return { kind: "resource", resourceKind: resource[1] };
  }
  throw new SpecificationError(`Reference valueOf must be $Variable or resource/Kind, got "${trimmed}"`, location);
}

function compileChildren(raw: RawNode, location: SpecificationLocation): NestedChildren {
  if (raw.expressionsMap !== undefined && raw.expressions !== undefined) {
    throw new SpecificationError("A nested expression takes expressionsMap or expressions, not both", location);
  }
  if (raw.expressionsMap !== undefined) {
    return {
      form: "map",
      members: [...raw.expressionsMap].map(([key, child]) => ({
        key,
        attribute: attributeName(key),
        node: compileNode(child, location, false),
      })),
    };
  }
  if (raw.expressions !== undefined) {
    return { form: "list", nodes: raw.expressions.map((child) => compileNode(child, location, false)) };
  }
  throw new SpecificationError("A nested expression needs expressionsMap or expressions", location);
}

function compileSettings(raw: RawNode, location: SpecificationLocation): NodeSettings {
  const vars = [...(raw.vars ?? [])].map(
    ([name, source]): VariableDeclaration => ({ name, source: compileVariable(source, location) }),
  );
  const constants = new Map<string, Scalar>(raw.constants ?? []);

  const settings: NodeSettings = {
    conditionAfterBind: false,
    vars,
    constants,
    generateList: raw.generateList ?? false,
    evaluateLater: raw.evaluateLater ?? false,
    required: raw.required ?? false,
  };

  if (raw.condition !== undefined) {
    const source = raw.condition;
    const condition = withLocation(location, () => parseCondition(source));
    const ownNames = new Set(vars.map((declaration) => declaration.name));
    settings.condition = condition;
    settings.conditionAfterBind = [...conditionVariables(condition)].some((name) => ownNames.has(name));
  }
  if (raw.specs !== undefined) {
    settings.specs = raw.specs.trim();
  }
  if (raw.type !== undefined) {
    const valueType = toValueType(raw.type);
    if (!valueType) {
      throw new SpecificationError(`Unknown value type "${raw.type}"`, location);
    }
    settings.valueType = valueType;
  }

  return settings;
}

/**
 * Descriptor forms:
 *   PATH | $name                    first value of a path or a variable
 *   TYPE, PATH                      value type applied to the path
 *   function, PATH                  one-argument script call
 *   PATH, function(args)            bind PATH, then call with named args
 *   function(args)                  call only
 */
function compileVariable(raw: RawVariable, location: SpecificationLocation): VariableSource {
  if (typeof raw !== "string") {
    if ("value" in raw) return { kind: "constant", value: raw.value };
    return { kind: "nested", node: compileNode(raw.nested, location, false) };
  }

  const text = raw.trim();
  const split = splitDescriptor(text, location);
  if (split === null) {
    if (isScriptCall(text)) {
      return { kind: "call", call: withLocation(location, () => parseScriptCall(text)) };
    }
    return { kind: "path", path: text };
  }

  const [head, tail] = split;
  if (isScriptCall(tail)) {
    return { kind: "call", path: head, call: withLocation(location, () => parseScriptCall(tail)) };
  }
  const valueType = toValueType(head);
  if (valueType) {
    return { kind: "typed", valueType, path: tail };
  }
  if (FUNCTION_NAME.test(head)) {
    return { kind: "function", functionName: head, path: tail };
  }
  throw new SpecificationError(`Cannot read variable descriptor "${text}"`, location);
}

/** Split at the first comma outside quotes and parentheses. */
function splitDescriptor(text: string, location: SpecificationLocation): [string, string] | null {
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    if (quote !== null) {
      if (char === "\\") i++;
      else if (char === quote) quote = null;
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "(") {
      depth++;
    } else if (char === ")") {
      depth--;
    } else if (char === "," && depth === 0) {
      const head = text.slice(0, i).trim();
      const tail = text.slice(i + 1).trim();
      if (!head || !tail) {
        throw new SpecificationError(`Cannot read variable descriptor "${text}"`, location);
      }
      return [head, tail];
    }
  }
  return null;
}

function withLocation<T>(location: SpecificationLocation, compile: () => T): T {
  try {
    return compile();
  } catch (error) {
    if (error instanceof SpecificationError) throw error.locatedAt(location);
    throw error;
  }
}
