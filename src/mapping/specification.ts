/**
 * Compiled mapping specifications.
 *
 * One Specification per resource kind (`resource/Encounter`) and per
 * reusable structure (`datatype/CodeableConcept`, `secondary/Participant`).
 * Everything here is built once by the loader and shared read-only by every
 * conversion run.
 */

import type { Condition } from "./condition";
import type { Scalar } from "./resource-instance";
import type { ScriptCall } from "./script-bridge";
import type { ValueType } from "./value-types";

export type VariableSource =
  /** `PV1.19.1 | PID.18.1` or `$name` */
  | { kind: "path"; path: string }
  /** `STRING, PV1.45` */
  | { kind: "typed"; valueType: ValueType; path: string }
  /** `buildIdentifierFromCwe, DG1.3` */
  | { kind: "function"; functionName: string; path: string }
  /** `$BASE_VALUE, extractAttribute(ref, "$.id", "STRING")` or a bare call */
  | { kind: "call"; path?: string; call: ScriptCall }
  | { kind: "constant"; value: Scalar }
  | { kind: "nested"; node: ExpressionNode };

export interface VariableDeclaration {
  name: string;
  source: VariableSource;
}

export interface NodeSettings {
  condition?: Condition;
  /**
   * The condition reads one of this node's own vars, so it is tested per
   * repetition after binding instead of before.
   */
  conditionAfterBind: boolean;
  vars: VariableDeclaration[];
  constants: ReadonlyMap<string, Scalar>;
  specs?: string;
  valueType?: ValueType;
  generateList: boolean;
  evaluateLater: boolean;
  required: boolean;
}

export type ReferenceTarget =
  | { kind: "variable"; name: string }
  | { kind: "resource"; resourceKind: string }
  | { kind: "base" };

export interface NamedNode {
  /** Declared key, e.g. `identifier_1`. */
  key: string;
  /** Attribute the output lands in, e.g. `identifier`. */
  attribute: string;
  node: ExpressionNode;
}

export type NestedChildren = { form: "map"; members: NamedNode[] } | { form: "list"; nodes: ExpressionNode[] };

export type ExpressionNode =
  | (NodeSettings & { kind: "path"; path: string })
  | (NodeSettings & { kind: "script"; call: ScriptCall })
  | (NodeSettings & { kind: "resource"; specificationName: string })
  | (NodeSettings & { kind: "reference"; target: ReferenceTarget })
  | (NodeSettings & { kind: "nested"; children: NestedChildren })
  | (NodeSettings & { kind: "constant"; value: Scalar });

export type ExpressionKind = ExpressionNode["kind"];

export interface Specification {
  name: string;
  /** Set for bundle resources (`resource/*`). */
  resourceType?: string;
  members: NamedNode[];
}

export interface SpecificationSet {
  /** @throws SpecificationError when no specification has that name */
  loadSpecification(name: string): Specification;
  has(name: string): boolean;
  names(): string[];
}

export const SPECIFICATION_FOLDERS = ["resource", "datatype", "secondary"] as const;

export function resourceSpecificationName(kind: string): string {
  return `resource/${kind}`;
}
