import { describe, test, expect } from "vitest";
import { createIdGenerator, generateId } from "../../../src/v2-to-fhir/id-generation";

describe("generateId", () => {
  test("kind and sequence in kebab case", () => {
    expect(generateId("MedicationRequest", 2)).toBe("medication-request-2");
  });

  test("control id is folded in", () => {
    expect(generateId("Patient", 1, "MSG001")).toBe("patient-1-msg001");
    expect(generateId("Encounter", 3, "ABC_12.x")).toBe("encounter-3-abc-12-x");
  });

  test("empty control id is ignored", () => {
    expect(generateId("Condition", 1, "")).toBe("condition-1");
  });
});

describe("createIdGenerator", () => {
  test("counts per kind", () => {
    const next = createIdGenerator("64322");
    expect([next("Condition"), next("Patient"), next("Condition")]).toEqual([
      "condition-1-64322",
      "patient-1-64322",
      "condition-2-64322",
    ]);
  });

  test("each generator starts over", () => {
    const first = createIdGenerator();
    first("Patient");
    expect(createIdGenerator()("Patient")).toBe("patient-1");
  });
});
