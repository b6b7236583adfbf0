import { Hl7v2Document } from "../../../src/hl7v2/document";
import type { FinalizedResource } from "../../../src/mapping/assembler";
import { runConversion, type RunResult, type TemplateResource } from "../../../src/mapping/engine";
import type { ConversionLogger } from "../../../src/mapping/logger";
import type { Scalar } from "../../../src/mapping/resource-instance";
import { ScriptRegistry, type ScriptFunction } from "../../../src/mapping/script-bridge";
import { createBuiltinFunctions, type CodeTables } from "../../../src/mapping/script-functions";
import { createSpecificationSet } from "../../../src/mapping/specification-loader";

export interface RecordingLogger extends ConversionLogger {
  debugLines: string[];
  warnLines: string[];
}

export function recordingLogger(): RecordingLogger {
  const debugLines: string[] = [];
  const warnLines: string[] = [];
  return {
    debugLines,
    warnLines,
    debug: (message) => debugLines.push(message),
    warn: (message) => warnLines.push(message),
  };
}

/** Segments joined with \r, the way they arrive over MLLP. */
export function message(...segments: string[]): string {
  return segments.join("\r");
}

export interface RunFixture {
  specifications: Record<string, string>;
  templates: TemplateResource[];
  functions?: Record<string, ScriptFunction>;
  codeTables?: CodeTables;
  constants?: Record<string, Scalar>;
  logger?: ConversionLogger;
}

export function run(raw: string, fixture: RunFixture): RunResult {
  const document = Hl7v2Document.fromString(raw);
  const scripts = new ScriptRegistry({ ...createBuiltinFunctions(fixture.codeTables), ...fixture.functions });

  return runConversion(document, fixture.templates, {
    specifications: createSpecificationSet(fixture.specifications),
    scripts,
    logger: fixture.logger ?? recordingLogger(),
    constants: fixture.constants ?? {},
    controlId: document.controlId(),
  });
}

export function resourcesOf(result: RunResult, kind: string): FinalizedResource[] {
  return result.resources.filter((resource) => resource.kind === kind);
}

export function onlyResource(result: RunResult, kind: string): FinalizedResource {
  const [resource, ...rest] = resourcesOf(result, kind);
  if (!resource || rest.length > 0) {
    throw new Error(`expected exactly one ${kind}, got ${resourcesOf(result, kind).length}`);
  }
  return resource;
}
