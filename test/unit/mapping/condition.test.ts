import { describe, test, expect } from "vitest";
import { conditionVariables, evaluateCondition, parseCondition } from "../../../src/mapping/condition";
import { SpecificationError } from "../../../src/mapping/errors";
import type { BoundValue } from "../../../src/mapping/values";

function lookupFrom(values: Record<string, BoundValue>) {
  return (name: string): BoundValue | null => values[name] ?? null;
}

function check(source: string, values: Record<string, BoundValue> = {}): boolean {
  return evaluateCondition(parseCondition(source), lookupFrom(values));
}

describe("parseCondition", () => {
  test("&& binds tighter than ||", () => {
    expect(parseCondition("$a NOT_NULL || $b NOT_NULL && $c NULL")).toEqual({
      kind: "or",
      terms: [
        { kind: "null", variable: "a", negated: true },
        {
          kind: "and",
          terms: [
            { kind: "null", variable: "b", negated: true },
            { kind: "null", variable: "c", negated: false },
          ],
        },
      ],
    });
  });

  test("comparison operands are literals or variables", () => {
    expect(parseCondition("$x EQUALS_STRING $y")).toEqual({
      kind: "equals",
      variable: "x",
      operand: { kind: "variable", name: "y" },
      negated: false,
    });
    expect(parseCondition("$x NOT_EQUALS_STRING 'two words'")).toEqual({
      kind: "equals",
      variable: "x",
      operand: { kind: "literal", value: "two words" },
      negated: true,
    });
  });

  test("IN takes a bracketed list", () => {
    expect(parseCondition("$class IN [E, I, 'O']")).toEqual({ kind: "in", variable: "class", values: ["E", "I", "O"] });
  });

  test.each([
    ["", "empty condition"],
    ["code NOT_NULL", "expected a $variable"],
    ["$code", "expected an operator after $code"],
    ["$code IS_SET", "unknown operator IS_SET"],
    ["$code NOT_NULL $other", "unexpected trailing input"],
    ["$code EQUALS_STRING", "expected a value to compare with"],
    ["$code IN E, I", "expected [ after IN"],
    ["$code EQUALS_STRING 'open", "unterminated string"],
  ])("rejects %j", (source, reason) => {
    expect(() => parseCondition(source)).toThrow(SpecificationError);
    expect(() => parseCondition(source)).toThrow(reason);
  });
});

describe("evaluateCondition", () => {
  test("NOT_NULL / NULL over bound and unbound variables", () => {
    expect(check("$code NOT_NULL", { code: "X" })).toBe(true);
    expect(check("$code NOT_NULL", { code: "  " })).toBe(false);
    expect(check("$code NOT_NULL")).toBe(false);
    expect(check("$code NULL")).toBe(true);
    expect(check("$list NOT_NULL", { list: [] })).toBe(false);
  });

  test("EQUALS_STRING compares text and fails when either side is unbound", () => {
    expect(check("$a EQUALS_STRING $b", { a: "C56.9-I10", b: "C56.9-I10" })).toBe(true);
    expect(check("$a EQUALS_STRING $b", { a: "C56.9-I10", b: "C56.9" })).toBe(false);
    expect(check("$a EQUALS_STRING $b", { a: "C56.9" })).toBe(false);
    expect(check("$a EQUALS_STRING $b")).toBe(false);
    expect(check("$a EQUALS_STRING I", { a: { 1: "I", 2: "Inpatient" } })).toBe(true);
  });

  test("NOT_EQUALS_STRING needs a value on both sides", () => {
    expect(check("$a NOT_EQUALS_STRING X", { a: "Y" })).toBe(true);
    expect(check("$a NOT_EQUALS_STRING X", { a: "X" })).toBe(false);
    expect(check("$a NOT_EQUALS_STRING X")).toBe(false);
  });

  test("IN is set membership", () => {
    expect(check("$class IN [E, I]", { class: "I" })).toBe(true);
    expect(check("$class IN [E, I]", { class: "O" })).toBe(false);
    expect(check("$class IN [E, I]")).toBe(false);
  });

  test("&& short-circuits left to right", () => {
    const seen: string[] = [];
    const lookup = (name: string): BoundValue | null => {
      seen.push(name);
      return null;
    };

    expect(evaluateCondition(parseCondition("$first NOT_NULL && $second NOT_NULL"), lookup)).toBe(false);
    expect(seen).toEqual(["first"]);
  });

  test("|| stops at the first true term", () => {
    const seen: string[] = [];
    const lookup = (name: string): BoundValue | null => {
      seen.push(name);
      return "set";
    };

    expect(evaluateCondition(parseCondition("$first NOT_NULL || $second NOT_NULL"), lookup)).toBe(true);
    expect(seen).toEqual(["first"]);
  });
});

describe("conditionVariables", () => {
  test("collects every variable a guard reads", () => {
    expect([...conditionVariables(parseCondition("$a EQUALS_STRING $b && $c IN [x] || $d NULL"))]).toEqual([
      "a",
      "b",
      "c",
      "d",
    ]);
  });
});
