/**
 * Builds the scope frame of one expression node: constants at the bottom,
 * then each `vars` entry bound in declaration order on top, so a var shadows
 * a constant of the same name and later vars read earlier ones.
 *
 * A failing script call surfaces as ScriptEvaluationError and drops the
 * node that declared the variable.
 */

import type { PathResolver } from "./path-resolver";
import type { Scope } from "./scope";
import { invokeScriptCall, type ScriptBridge } from "./script-bridge";
import type { ExpressionNode, NodeSettings, VariableDeclaration } from "./specification";
import { applyValueType } from "./value-types";
import type { BoundValue } from "./values";

export interface BindingEnvironment {
  paths: PathResolver;
  scripts: ScriptBridge;
  /** Zone of DATE_TIME values without an offset. */
  zoneId?: string;
  /** Evaluate a `{ nested: ... }` descriptor in the scope bound so far. */
  evaluateNested: (node: ExpressionNode, scope: Scope) => BoundValue[];
}

const WHOLE_VARIABLE = /^\$([A-Za-z_][A-Za-z0-9_]*)$/;

export function bindVariables(
  settings: Pick<NodeSettings, "vars" | "constants">,
  parent: Scope,
  environment: BindingEnvironment,
): Scope {
  let scope = parent.extend(settings.constants);

  for (const declaration of settings.vars) {
    scope = scope.bind(declaration.name, resolveVariable(declaration, scope, environment));
  }

  return scope;
}

export function resolveVariable(
  declaration: VariableDeclaration,
  scope: Scope,
  environment: BindingEnvironment,
): BoundValue | null {
  const { source } = declaration;

  switch (source.kind) {
    case "constant":
      return source.value;
    case "path":
      return readSource(source.path, scope, environment);
    case "typed":
      return applyValueType(source.valueType, readSource(source.path, scope, environment), {
        zoneId: environment.zoneId,
      });
    case "function":
      return environment.scripts.invoke(source.functionName, [
        { name: declaration.name, value: readSource(source.path, scope, environment) },
      ]);
    case "call": {
      const callScope =
        source.path === undefined
          ? scope
          : scope.bind(declaration.name, readSource(source.path, scope, environment));
      return invokeScriptCall(environment.scripts, source.call, (name) => callScope.lookup(name));
    }
    case "nested": {
      const values = environment.evaluateNested(source.node, scope);
      if (source.node.generateList) return values;
      return values[0] ?? null;
    }
  }
}

/**
 * `$name` alone binds the variable's whole value (all instances for a
 * `$Kind`); any other path binds its first value.
 */
function readSource(path: string, scope: Scope, environment: BindingEnvironment): BoundValue | null {
  const whole = WHOLE_VARIABLE.exec(path);
  if (whole?.[1]) return scope.lookup(whole[1]);
  return environment.paths.resolve(path, scope)[0] ?? null;
}
