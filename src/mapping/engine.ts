/**
 * One conversion run: an immediate pass over the message's template
 * resources, then a single drain of the deferred queue.
 *
 * A run either returns every resource it built or throws the first fatal
 * error; nothing partial escapes.
 */

import type { SourceDocument } from "../hl7v2/document";
import type { FinalizedResource } from "./assembler";
import { createConversionContext, type Diagnostic } from "./conversion-context";
import { ExpressionEvaluator } from "./expression-evaluator";
import type { ConversionLogger } from "./logger";
import type { Scalar } from "./resource-instance";
import { Scope } from "./scope";
import type { ScriptBridge } from "./script-bridge";
import type { SpecificationSet } from "./specification";

/** One resource of a message template: built once per `segment` occurrence. */
export interface TemplateResource {
  resourceName: string;
  segment: string;
  /** Build one resource for every occurrence instead of only the first. */
  repeats?: boolean;
}

export interface RunOptions {
  specifications: SpecificationSet;
  scripts: ScriptBridge;
  logger: ConversionLogger;
  constants?: Readonly<Record<string, Scalar>>;
  /** MSH-10, folded into generated ids. */
  controlId?: string;
}

export interface RunResult {
  resources: FinalizedResource[];
  diagnostics: Diagnostic[];
}

export function runConversion(
  document: SourceDocument,
  templates: readonly TemplateResource[],
  options: RunOptions,
): RunResult {
  const context = createConversionContext({ document, ...options });
  const evaluator = new ExpressionEvaluator(context);

  // Kind names nobody binds resolve to the instances registered so far.
  const root = Scope.root(context.constants, (name) => {
    const instances = context.assembler.instancesOf(name);
    return instances.length > 0 ? [...instances] : null;
  });

  for (const template of templates) {
    const occurrences = document.segments(template.segment);
    const selected = template.repeats ? occurrences : occurrences.slice(0, 1);

    for (const segment of selected) {
      evaluator.buildResource(template.resourceName, root.withBaseValue(segment));
    }
  }

  const deferred = context.deferred.size;
  context.deferred.drain((entry) => evaluator.runDeferred(entry));

  const resources = context.assembler.finalizedBundle();
  context.logger.debug(
    `built ${resources.length} resources (${deferred} deferred evaluations, ${context.diagnostics.length} diagnostics)`,
  );

  return { resources, diagnostics: [...context.diagnostics] };
}
