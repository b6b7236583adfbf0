/**
 * ConverterContext: single object carrying all runtime dependencies the
 * converter needs.
 *
 * Construct via createConverterContext() for production use, or build an
 * object literal / use makeTestContext() in tests.
 */

import { join } from "path";
import { CODE_TABLES_FILE, loadCodeTables } from "../mapping/code-tables";
import { consoleLogger, type ConversionLogger } from "../mapping/logger";
import { ScriptRegistry, type ScriptBridge } from "../mapping/script-bridge";
import { createBuiltinFunctions } from "../mapping/script-functions";
import type { SpecificationSet } from "../mapping/specification";
import { loadSpecificationSet } from "../mapping/specification-loader";
import { hl7v2ToFhirConfig, type Hl7v2ToFhirConfig } from "./config";

export interface ConverterContext {
  /**
   * Loaded HL7v2-to-FHIR config.
   * Injected explicitly so the converter is not coupled to the global
   * singleton and tests can supply alternative configs.
   */
  config: Hl7v2ToFhirConfig;

  /** Compiled mapping specifications, shared by every conversion. */
  specifications: SpecificationSet;

  /** Scripted-value functions callable from specifications. */
  scripts: ScriptBridge;

  logger: ConversionLogger;
}

type LoadedSpecifications = Pick<ConverterContext, "specifications" | "scripts">;

const loadedDirectories = new Map<string, LoadedSpecifications>();

/**
 * Specifications and code tables of one directory, read once per process.
 */
export function specificationsFor(directory: string): LoadedSpecifications {
  const cached = loadedDirectories.get(directory);
  if (cached) return cached;

  const loaded: LoadedSpecifications = {
    specifications: loadSpecificationSet(directory),
    scripts: new ScriptRegistry(createBuiltinFunctions(loadCodeTables(join(directory, CODE_TABLES_FILE)))),
  };
  loadedDirectories.set(directory, loaded);
  return loaded;
}

/**
 * Construct a ConverterContext wired with production defaults:
 *   - config:          loaded via hl7v2ToFhirConfig() (cached singleton)
 *   - specifications:  YAML files under config.specificationDirectory
 *   - scripts:         built-in functions with that directory's code tables
 *   - logger:          console
 */
export function createConverterContext(): ConverterContext {
  const config = hl7v2ToFhirConfig();
  return {
    config,
    ...specificationsFor(config.specificationDirectory),
    logger: consoleLogger,
  };
}
