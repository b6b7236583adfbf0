import { describe, test, expect } from "vitest";
import { Hl7v2Document } from "../../../src/hl7v2/document";
import { SpecificationError } from "../../../src/mapping/errors";
import { navigate, parsePath, PathResolver } from "../../../src/mapping/path-resolver";
import { Scope } from "../../../src/mapping/scope";
import { message } from "./helpers";

const document = Hl7v2Document.fromString(
  message(
    "MSH|^~\\&|||||20240101120000||ADT^A01|MSG001|P|2.5",
    "PID|1||12345^^^HOSP^MR~67890^^^OTHER||DOE^JANE",
    "PV1|1|I|||||111^SMITH^ANN~222^JONES^BOB||||||||||||V100",
    "DG1|1||A01.1^First^I10",
    "DG1|2||B02.2^Second^I10",
  ),
);

const resolver = new PathResolver(document);
const root = Scope.root();

describe("parsePath", () => {
  test("splits alternatives and indices", () => {
    expect(parsePath("PV1.19.1 | $code.2 | .3").alternatives).toEqual([
      { kind: "segment", segment: "PV1", indices: [19, 1] },
      { kind: "variable", name: "code", indices: [2] },
      { kind: "base", indices: [3] },
    ]);
  });

  test("caches parsed paths", () => {
    expect(parsePath("PID.3.1")).toBe(parsePath("PID.3.1"));
  });

  test.each(["PID..3", "pid.3", "PID.3 |", "PID.0", "$1abc", "PID.1.2.3.4"])("rejects %s", (source) => {
    expect(() => parsePath(source)).toThrow(SpecificationError);
  });
});

describe("PathResolver.resolve", () => {
  test("field of the first occurrence when not iterating", () => {
    expect(resolver.resolve("DG1.3.1", root)).toEqual(["A01.1"]);
  });

  test("field of the occurrence bound in scope", () => {
    const second = document.segments("DG1")[1];
    if (!second) throw new Error("fixture has two DG1");

    expect(resolver.resolve("DG1.3.1", root.withBaseValue(second))).toEqual(["B02.2"]);
  });

  test("bare segment returns every occurrence", () => {
    expect(resolver.resolve("DG1", root)).toHaveLength(2);
  });

  test("repeating field fans out component access", () => {
    expect(resolver.resolve("PID.3.1", root)).toEqual(["12345", "67890"]);
    expect(resolver.resolve("PV1.7.2", root)).toEqual(["SMITH", "JONES"]);
  });

  test("first alternative with a value wins", () => {
    expect(resolver.resolve("PV1.50 | PV1.19 | PID.18", root)).toEqual(["V100"]);
  });

  test("missing data is an empty result", () => {
    expect(resolver.resolve("PV1.44", root)).toEqual([]);
    expect(resolver.resolve("AL1.3", root)).toEqual([]);
  });

  test("base-relative components read $BASE_VALUE", () => {
    const scope = root.withBaseValue({ 1: "C56.9", 2: "Ovarian", 3: "I10" });

    expect(resolver.resolve(".3", scope)).toEqual(["I10"]);
  });

  test("variable components read the bound value", () => {
    const scope = root.bind("cwe", { 1: "X", 2: "Y" });

    expect(resolver.resolve("$cwe.2", scope)).toEqual(["Y"]);
    expect(resolver.resolve("$cwe", scope)).toEqual([{ 1: "X", 2: "Y" }]);
    expect(resolver.resolve("$unbound.1", scope)).toEqual([]);
  });
});

describe("navigate", () => {
  test("a primitive is its own first component", () => {
    expect(navigate("ABC", [1])).toEqual(["ABC"]);
    expect(navigate("ABC", [2])).toEqual([]);
  });

  test("null navigates to nothing", () => {
    expect(navigate(null, [1])).toEqual([]);
  });
});
