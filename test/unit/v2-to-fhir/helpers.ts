import { readFileSync } from "fs";
import { dirname } from "path";
import { fileURLToPath } from "url";
import { silentLogger } from "../../../src/mapping/logger";
import { validateConfig } from "../../../src/v2-to-fhir/config";
import { specificationsFor, type ConverterContext } from "../../../src/v2-to-fhir/converter-context";
import type { Bundle, Resource } from "../../../src/v2-to-fhir/fhir-bundle";

const CONFIG_FILE = fileURLToPath(new URL("../../../config/hl7v2-to-fhir.json", import.meta.url));

/** Context over the shipped config and specifications, logging nothing. */
export function makeTestContext(overrides?: Partial<ConverterContext>): ConverterContext {
  const config = overrides?.config ?? validateConfig(JSON.parse(readFileSync(CONFIG_FILE, "utf-8")), dirname(CONFIG_FILE));
  return {
    config,
    ...specificationsFor(config.specificationDirectory),
    logger: silentLogger,
    ...overrides,
  };
}

export function resourcesOfType(bundle: Bundle, resourceType: string): Resource[] {
  return bundle.entry.map((entry) => entry.resource).filter((resource) => resource.resourceType === resourceType);
}
