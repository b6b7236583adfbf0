import { readFileSync } from "fs";
import { dirname, join, resolve } from "path";
import type { Scalar } from "../mapping/resource-instance";
import { isKnownZone } from "./datatypes/dtm-datetime";

/**
 * Configuration for message-type-specific conversion behavior.
 * Message configs are keyed by message type strings (e.g., "ADT-A01").
 *
 * {
 *   "specificationDirectory": "../resources/hl7",
 *   "constants": { "baseUrl": "http://example.org", "zoneId": "Europe/Berlin" },
 *   "messages": {
 *     "ADT-A01": {
 *       "resources": [
 *         { "resourceName": "Patient", "segment": "PID" },
 *         { "resourceName": "Condition", "segment": "DG1", "repeats": true }
 *       ]
 *     }
 *   }
 * }
 */

export type TemplateResourceConfig = {
  resourceName: string;
  segment: string;
  repeats?: boolean;
};

export type MessageTypeConfig = {
  resources: TemplateResourceConfig[];
};

export type Hl7v2ToFhirConfig = {
  /** Absolute once loaded; the file may give it relative to itself. */
  specificationDirectory: string;
  constants: Record<string, Scalar>;
  messages: Record<string, MessageTypeConfig | undefined>;
};

const DEFAULT_CONFIG_PATH = join(process.cwd(), "config", "hl7v2-to-fhir.json");

function getConfigPath(): string {
  return process.env.HL7V2_TO_FHIR_CONFIG ?? DEFAULT_CONFIG_PATH;
}

let cachedConfig: Hl7v2ToFhirConfig | null = null;

/**
 * Returns the HL7v2-to-FHIR configuration (lazy singleton).
 * Config is loaded once at first call and cached for process lifetime.
 *
 * @throws Error if config file is missing, malformed, or has the wrong shape
 */
export function hl7v2ToFhirConfig(): Hl7v2ToFhirConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const configPath = getConfigPath();

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error reading file";
    throw new Error(`Failed to load HL7v2-to-FHIR config from ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new Error(`Failed to parse HL7v2-to-FHIR config as JSON: ${message}`);
  }

  cachedConfig = validateConfig(parsed, dirname(configPath));
  return cachedConfig;
}

/**
 * Validates the parsed config and resolves `specificationDirectory`
 * against the directory holding the config file.
 * @throws Error describing the first problem found
 */
export function validateConfig(parsed: unknown, baseDir: string): Hl7v2ToFhirConfig {
  if (!isRecord(parsed)) {
    throw new Error(
      `Invalid HL7v2-to-FHIR config: expected object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`,
    );
  }

  const { specificationDirectory, constants = {}, messages } = parsed;

  if (typeof specificationDirectory !== "string" || specificationDirectory.trim() === "") {
    throw new Error("Invalid HL7v2-to-FHIR config: specificationDirectory must be a non-empty string");
  }

  if (!isRecord(constants)) {
    throw new Error("Invalid HL7v2-to-FHIR config: constants must be an object");
  }
  const validConstants: Record<string, Scalar> = {};
  for (const [name, value] of Object.entries(constants)) {
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new Error(`Invalid HL7v2-to-FHIR config: constant "${name}" must be a string, number or boolean`);
    }
    validConstants[name] = value;
  }
  const { zoneId } = validConstants;
  if (zoneId !== undefined && (typeof zoneId !== "string" || !isKnownZone(zoneId))) {
    throw new Error('Invalid HL7v2-to-FHIR config: constant "zoneId" must name a known time zone');
  }

  if (!isRecord(messages)) {
    throw new Error("Invalid HL7v2-to-FHIR config: messages must be an object keyed by message type");
  }
  const validMessages: Record<string, MessageTypeConfig> = {};
  for (const [messageType, messageConfig] of Object.entries(messages)) {
    validMessages[messageType] = validateMessageConfig(messageType, messageConfig);
  }

  return {
    specificationDirectory: resolve(baseDir, specificationDirectory),
    constants: validConstants,
    messages: validMessages,
  };
}

function validateMessageConfig(messageType: string, messageConfig: unknown): MessageTypeConfig {
  if (!isRecord(messageConfig) || !Array.isArray(messageConfig.resources)) {
    throw new Error(`Invalid config for ${messageType}: expected { resources: [...] }`);
  }

  const resources = messageConfig.resources.map((entry: unknown, index: number): TemplateResourceConfig => {
    const where = `${messageType}.resources[${index}]`;
    if (!isRecord(entry)) {
      throw new Error(`Invalid config for ${where}: expected object`);
    }
    const { resourceName, segment, repeats } = entry;
    if (typeof resourceName !== "string" || resourceName === "") {
      throw new Error(`Invalid config for ${where}: resourceName is required`);
    }
    if (typeof segment !== "string" || !/^[A-Z][A-Z0-9]{2}$/.test(segment)) {
      throw new Error(`Invalid config for ${where}: segment must be a 3-character segment name`);
    }
    if (repeats !== undefined && typeof repeats !== "boolean") {
      throw new Error(`Invalid config for ${where}: repeats must be a boolean`);
    }
    return repeats === undefined ? { resourceName, segment } : { resourceName, segment, repeats };
  });

  return { resources };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Clears the cached config. Used for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
