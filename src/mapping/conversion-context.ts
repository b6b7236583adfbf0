/**
 * State of one conversion run. Only the specification set and the script
 * bridge are shared between runs; everything else here belongs to the run
 * and is dropped with it.
 */

import type { SourceDocument } from "../hl7v2/document";
import { isKnownZone } from "../v2-to-fhir/datatypes/dtm-datetime";
import { createIdGenerator } from "../v2-to-fhir/id-generation";
import { BundleAssembler } from "./assembler";
import { DeferredQueue } from "./deferred-queue";
import type { SpecificationLocation } from "./errors";
import type { ConversionLogger } from "./logger";
import { PathResolver } from "./path-resolver";
import type { Scalar } from "./resource-instance";
import type { ScriptBridge } from "./script-bridge";
import type { SpecificationSet } from "./specification";

export type DiagnosticKind = "script-error" | "unresolved-reference" | "required-missing";

/** A node-local problem that was logged and skipped, never thrown. */
export interface Diagnostic {
  kind: DiagnosticKind;
  location: SpecificationLocation;
  message: string;
}

export interface ConversionContext {
  document: SourceDocument;
  paths: PathResolver;
  specifications: SpecificationSet;
  scripts: ScriptBridge;
  assembler: BundleAssembler;
  deferred: DeferredQueue;
  logger: ConversionLogger;
  /** Message-level constants, visible to every expression. */
  constants: Readonly<Record<string, Scalar>>;
  /** The `zoneId` constant: zone of source timestamps without an offset. */
  zoneId?: string;
  diagnostics: Diagnostic[];
}

export interface ConversionContextOptions {
  document: SourceDocument;
  specifications: SpecificationSet;
  scripts: ScriptBridge;
  logger: ConversionLogger;
  constants?: Readonly<Record<string, Scalar>>;
  controlId?: string;
}

export const ZONE_ID_CONSTANT = "zoneId";

/** @throws Error when the `zoneId` constant names no known time zone */
export function createConversionContext(options: ConversionContextOptions): ConversionContext {
  const constants = options.constants ?? {};
  const zoneId = constants[ZONE_ID_CONSTANT];
  if (typeof zoneId === "string" && zoneId !== "" && !isKnownZone(zoneId)) {
    throw new Error(`Unknown time zone "${zoneId}" in constant ${ZONE_ID_CONSTANT}`);
  }
  return {
    document: options.document,
    paths: new PathResolver(options.document),
    specifications: options.specifications,
    scripts: options.scripts,
    assembler: new BundleAssembler(createIdGenerator(options.controlId)),
    deferred: new DeferredQueue(),
    logger: options.logger,
    constants,
    ...(typeof zoneId === "string" && zoneId !== "" ? { zoneId } : {}),
    diagnostics: [],
  };
}

export function reportDiagnostic(context: ConversionContext, diagnostic: Diagnostic): void {
  context.diagnostics.push(diagnostic);

  const where = [diagnostic.location.resourceKind, diagnostic.location.attribute].filter(Boolean).join(".");
  const line = `${diagnostic.kind} at ${where || "<root>"}: ${diagnostic.message}`;
  if (diagnostic.kind === "unresolved-reference") {
    context.logger.debug(line);
  } else {
    context.logger.warn(line);
  }
}
