import { describe, test, expect } from "vitest";
import { escapeHtml, toKebabCase } from "../../../src/utils/string";

describe("toKebabCase", () => {
  test.each([
    ["MedicationRequest", "medication-request"],
    ["Essential Hypertension", "essential-hypertension"],
    ["LAB_SYSTEM", "lab-system"],
    ["--edge--", "edge"],
  ])("%s → %s", (input, expected) => {
    expect(toKebabCase(input)).toBe(expected);
  });
});

describe("escapeHtml", () => {
  test("escapes markup characters, ampersand first", () => {
    expect(escapeHtml('<b class="x">A & B</b>')).toBe("&lt;b class=&quot;x&quot;&gt;A &amp; B&lt;/b&gt;");
  });
});
