/**
 * Expression evaluation: GuardCheck → Bind → Produce → Immediate | Deferred.
 *
 * - GuardCheck tests `condition` on the inherited scope, before this node's
 *   vars exist. A false guard skips the node and everything under it.
 *   A guard that reads one of the node's own vars is instead tested per
 *   repetition after Bind; over a `$Kind` list that is the join filter.
 * - Bind layers constants and vars (./variable-binding.ts), once per
 *   repetition of `specs`.
 * - Produce dispatches on the node kind.
 * - Resource attributes marked `evaluateLater` are queued with the scope
 *   they would have been evaluated in and run after every resource exists.
 *
 * ScriptEvaluationError stops at the node that raised it. SpecificationError
 * and SourceDataError abort the run.
 */

import { evaluateCondition } from "./condition";
import { reportDiagnostic, type ConversionContext } from "./conversion-context";
import type { DeferredEvaluation } from "./deferred-queue";
import { ScriptEvaluationError, SpecificationError, type SpecificationLocation } from "./errors";
import { resolveJoin } from "./join-resolver";
import { spliceFragments, type Fragment, type FragmentRecord, type ResourceInstance } from "./resource-instance";
import { BASE_VALUE, type Scope } from "./scope";
import { invokeScriptCall } from "./script-bridge";
import { resourceSpecificationName, type ExpressionNode, type NamedNode } from "./specification";
import { applyValueType } from "./value-types";
import { bindVariables, type BindingEnvironment } from "./variable-binding";
import { isEmptyValue, isResourceInstance, toFragment, toList, toText, type BoundValue } from "./values";

const WHOLE_VARIABLE = /^\$([A-Za-z_][A-Za-z0-9_]*)$/;
const REFERENCE_TEXT = /^[A-Z][A-Za-z]+\/[^/\s]+$/;

type Node<K extends ExpressionNode["kind"]> = Extract<ExpressionNode, { kind: K }>;

export function toFragments(values: readonly BoundValue[]): Fragment[] {
  return values.map((value) => toFragment(value)).filter((fragment): fragment is Fragment => fragment !== null);
}

export class ExpressionEvaluator {
  constructor(private readonly context: ConversionContext) {}

  /** Evaluate one node; node-local failures are reported and yield nothing. */
  evaluate(node: ExpressionNode, scope: Scope, location: SpecificationLocation): BoundValue[] {
    let values: BoundValue[];
    try {
      values = this.evaluateNode(node, scope, location);
    } catch (error) {
      if (error instanceof ScriptEvaluationError) {
        reportDiagnostic(this.context, { kind: "script-error", location, message: error.message });
        return [];
      }
      if (error instanceof SpecificationError) {
        throw error.locatedAt(location);
      }
      throw error;
    }

    if (node.required && values.length === 0) {
      reportDiagnostic(this.context, {
        kind: "required-missing",
        location,
        message: "required expression produced no value",
      });
    }
    return values;
  }

  /**
   * Create a resource of `kind` from `resource/<kind>`, evaluate its
   * immediate attributes in `scope`, queue the deferred ones, then register
   * it for `$Kind` lookups.
   */
  buildResource(kind: string, scope: Scope): ResourceInstance {
    const specification = this.context.specifications.loadSpecification(resourceSpecificationName(kind));
    const instance = this.context.assembler.createShell(specification.resourceType ?? kind);

    this.evaluateMembers(specification.members, scope, instance.attributes, { resourceKind: kind }, instance);
    this.context.assembler.register(instance);
    return instance;
  }

  runDeferred(entry: DeferredEvaluation): void {
    const values = this.evaluate(entry.node, entry.scope, entry.target.location);
    spliceFragments(entry.target.instance.attributes, entry.target.attribute, toFragments(values), entry.node.generateList);
  }

  /**
   * Evaluate named members in order into `record`. Each member's output is
   * bound under its key for the members after it. Deferral is only possible
   * when the members belong to a resource (`owner`).
   */
  private evaluateMembers(
    members: readonly NamedNode[],
    scope: Scope,
    record: FragmentRecord,
    location: SpecificationLocation,
    owner?: ResourceInstance,
  ): void {
    let siblings = scope;

    for (const member of members) {
      const memberLocation: SpecificationLocation = owner
        ? { resourceKind: location.resourceKind, attribute: member.key }
        : location;

      if (member.node.evaluateLater) {
        if (!owner) {
          throw new SpecificationError("evaluateLater is only allowed on resource attributes", memberLocation);
        }
        this.context.deferred.enqueue(member.node, siblings, {
          instance: owner,
          attribute: member.attribute,
          location: memberLocation,
        });
        continue;
      }

      const values = this.evaluate(member.node, siblings, memberLocation);
      spliceFragments(record, member.attribute, toFragments(values), member.node.generateList);

      const first = values[0];
      if (first !== undefined) {
        siblings = siblings.bind(member.key, member.node.generateList ? values : first);
      }
    }
  }

  private evaluateNode(node: ExpressionNode, scope: Scope, location: SpecificationLocation): BoundValue[] {
    if (node.condition && !node.conditionAfterBind) {
      if (!evaluateCondition(node.condition, (name) => scope.lookup(name))) return [];
    }

    const outputs: BoundValue[] = [];
    for (const frame of this.frames(node, scope, location)) {
      const produced = this.produce(node, frame, location);
      if (produced.length === 0) continue;
      outputs.push(...produced);
      if (!node.generateList) break;
    }

    return node.generateList ? outputs : outputs.slice(0, 1);
  }

  /** One bound scope per repetition that passed the node's post-bind guard. */
  private *frames(node: ExpressionNode, scope: Scope, location: SpecificationLocation): Generator<Scope> {
    const environment = this.bindingFor(location);
    const bind = (base: Scope): Scope => bindVariables(node, base, environment);
    const filter = node.conditionAfterBind ? node.condition : undefined;

    if (node.specs === undefined) {
      const frame = bind(scope);
      if (!filter || evaluateCondition(filter, (name) => frame.lookup(name))) yield frame;
      return;
    }

    const candidates = this.repetitions(node.specs, scope);

    if (filter) {
      const matches = resolveJoin({
        candidates,
        bindCandidate: (candidate) => bind(scope.withBaseValue(candidate)),
        match: filter,
        firstOnly: !node.generateList,
      });
      if (matches.length === 0 && candidates.length > 0 && WHOLE_VARIABLE.test(node.specs)) {
        reportDiagnostic(this.context, {
          kind: "unresolved-reference",
          location,
          message: `none of ${candidates.length} candidates in ${node.specs} matched`,
        });
      }
      yield* matches;
      return;
    }

    for (const candidate of candidates) {
      yield bind(scope.withBaseValue(candidate));
    }
  }

  private repetitions(specs: string, scope: Scope): BoundValue[] {
    const whole = WHOLE_VARIABLE.exec(specs);
    if (whole?.[1]) {
      return toList(scope.lookup(whole[1])).filter((value) => !isEmptyValue(value));
    }
    return this.context.paths.resolve(specs, scope);
  }

  private produce(node: ExpressionNode, scope: Scope, location: SpecificationLocation): BoundValue[] {
    switch (node.kind) {
      case "constant":
        return this.typed(node, [node.value]);
      case "path":
        return this.typed(node, this.select(node, this.context.paths.resolve(node.path, scope)));
      case "script": {
        const result = invokeScriptCall(this.context.scripts, node.call, (name) => scope.lookup(name));
        const values = toList(result).filter((value) => !isEmptyValue(value));
        return this.typed(node, this.select(node, values));
      }
      case "resource":
        return this.produceStructure(node, scope, location);
      case "reference":
        return this.produceReference(node, scope);
      case "nested":
        return this.produceNested(node, scope, location);
    }
  }

  private produceStructure(node: Node<"resource">, scope: Scope, location: SpecificationLocation): BoundValue[] {
    const specification = this.context.specifications.loadSpecification(node.specificationName);
    const record: FragmentRecord = {};
    this.evaluateMembers(specification.members, scope, record, location);
    return Object.keys(record).length > 0 ? [record] : [];
  }

  private produceReference(node: Node<"reference">, scope: Scope): BoundValue[] {
    const { target } = node;
    if (target.kind === "resource") {
      return [this.buildResource(target.resourceKind, scope)];
    }

    const source = scope.lookup(target.kind === "variable" ? target.name : BASE_VALUE);
    const references = toList(source).flatMap((value): BoundValue[] => {
      if (isResourceInstance(value)) return [value];
      const text = typeof value === "string" ? toText(value) : null;
      return text !== null && REFERENCE_TEXT.test(text) ? [{ reference: text }] : [];
    });
    return this.select(node, references);
  }

  private produceNested(node: Node<"nested">, scope: Scope, location: SpecificationLocation): BoundValue[] {
    const { children } = node;
    if (children.form === "list") {
      return children.nodes.flatMap((child) => this.evaluate(child, scope, location));
    }

    const record: FragmentRecord = {};
    this.evaluateMembers(children.members, scope, record, location);
    return Object.keys(record).length > 0 ? [record] : [];
  }

  /** All values when the node lists over its own value source, else the first. */
  private select(node: ExpressionNode, values: BoundValue[]): BoundValue[] {
    return node.generateList && node.specs === undefined ? values : values.slice(0, 1);
  }

  private typed(node: ExpressionNode, values: BoundValue[]): BoundValue[] {
    const { valueType } = node;
    if (!valueType) return values;
    return values
      .map((value) => applyValueType(valueType, value, { zoneId: this.context.zoneId }))
      .filter((value): value is BoundValue => value !== null);
  }

  private bindingFor(location: SpecificationLocation): BindingEnvironment {
    return {
      paths: this.context.paths,
      scripts: this.context.scripts,
      zoneId: this.context.zoneId,
      evaluateNested: (node, scope) => this.evaluate(node, scope, location),
    };
  }
}
