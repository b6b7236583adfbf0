import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { clearConfigCache, hl7v2ToFhirConfig, validateConfig } from "../../../src/v2-to-fhir/config";

describe("hl7v2ToFhirConfig", () => {
  let directory: string;
  const previousPath = process.env.HL7V2_TO_FHIR_CONFIG;

  function writeConfig(content: string): void {
    const file = join(directory, "hl7v2-to-fhir.json");
    writeFileSync(file, content);
    process.env.HL7V2_TO_FHIR_CONFIG = file;
  }

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "hl7v2-config-"));
    clearConfigCache();
  });

  afterEach(() => {
    if (previousPath === undefined) {
      delete process.env.HL7V2_TO_FHIR_CONFIG;
    } else {
      process.env.HL7V2_TO_FHIR_CONFIG = previousPath;
    }
    rmSync(directory, { recursive: true, force: true });
    clearConfigCache();
  });

  test("config file missing throws startup error", () => {
    process.env.HL7V2_TO_FHIR_CONFIG = join(directory, "missing.json");

    expect(() => hl7v2ToFhirConfig()).toThrow(/Failed to load HL7v2-to-FHIR config.*ENOENT/);
  });

  test("config file malformed JSON throws startup error with parse details", () => {
    writeConfig("{ invalid json");

    expect(() => hl7v2ToFhirConfig()).toThrow(/Failed to parse HL7v2-to-FHIR config as JSON/);
  });

  test("valid config resolves the specification directory next to the file", () => {
    writeConfig(
      JSON.stringify({
        specificationDirectory: "specs",
        constants: { baseUrl: "http://example.org" },
        messages: {
          "ADT-A01": { resources: [{ resourceName: "Patient", segment: "PID" }] },
        },
      }),
    );

    expect(hl7v2ToFhirConfig()).toEqual({
      specificationDirectory: join(directory, "specs"),
      constants: { baseUrl: "http://example.org" },
      messages: {
        "ADT-A01": { resources: [{ resourceName: "Patient", segment: "PID" }] },
      },
    });
  });

  test("config is cached until cleared", () => {
    writeConfig(JSON.stringify({ specificationDirectory: "a", messages: {} }));
    const first = hl7v2ToFhirConfig();

    writeConfig(JSON.stringify({ specificationDirectory: "b", messages: {} }));
    expect(hl7v2ToFhirConfig()).toBe(first);

    clearConfigCache();
    expect(hl7v2ToFhirConfig().specificationDirectory).toBe(join(directory, "b"));
  });
});

describe("validateConfig", () => {
  const base = "/etc/hl7";

  test("constants default to empty and repeats is kept when given", () => {
    const config = validateConfig(
      {
        specificationDirectory: "/srv/specs",
        messages: {
          "ADT-A08": { resources: [{ resourceName: "Condition", segment: "DG1", repeats: true }] },
        },
      },
      base,
    );

    expect(config).toEqual({
      specificationDirectory: "/srv/specs",
      constants: {},
      messages: {
        "ADT-A08": { resources: [{ resourceName: "Condition", segment: "DG1", repeats: true }] },
      },
    });
  });

  test.each([
    [[], /expected object, got array/],
    [{ messages: {} }, /specificationDirectory must be a non-empty string/],
    [{ specificationDirectory: "s", constants: [], messages: {} }, /constants must be an object/],
    [{ specificationDirectory: "s", constants: { nested: {} }, messages: {} }, /constant "nested" must be a string/],
    [
      { specificationDirectory: "s", constants: { zoneId: "Nowhere/Special" }, messages: {} },
      /"zoneId" must name a known time zone/,
    ],
    [{ specificationDirectory: "s", constants: { zoneId: 5 }, messages: {} }, /"zoneId" must name a known time zone/],
    [{ specificationDirectory: "s" }, /messages must be an object keyed by message type/],
    [{ specificationDirectory: "s", messages: { "ADT-A01": {} } }, /Invalid config for ADT-A01: expected \{ resources/],
    [
      { specificationDirectory: "s", messages: { "ADT-A01": { resources: [{ segment: "PID" }] } } },
      /ADT-A01\.resources\[0\]: resourceName is required/,
    ],
    [
      { specificationDirectory: "s", messages: { "ADT-A01": { resources: [{ resourceName: "Patient", segment: "pid" }] } } },
      /segment must be a 3-character segment name/,
    ],
    [
      {
        specificationDirectory: "s",
        messages: { "ADT-A01": { resources: [{ resourceName: "Patient", segment: "PID", repeats: "yes" }] } },
      },
      /repeats must be a boolean/,
    ],
  ])("rejects %j", (parsed, message) => {
    expect(() => validateConfig(parsed, base)).toThrow(message);
  });
});
