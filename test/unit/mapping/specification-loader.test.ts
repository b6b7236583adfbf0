import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SpecificationError } from "../../../src/mapping/errors";
import {
  attributeName,
  compileSpecification,
  createSpecificationSet,
  loadSpecificationSet,
} from "../../../src/mapping/specification-loader";

function compileError(name: string, yaml: string): SpecificationError {
  try {
    compileSpecification(name, yaml);
  } catch (error) {
    if (error instanceof SpecificationError) return error;
    throw error;
  }
  throw new Error("expected a SpecificationError");
}

describe("attributeName", () => {
  test("drops the numeric suffix", () => {
    expect(attributeName("identifier_2")).toBe("identifier");
    expect(attributeName("reasonCode")).toBe("reasonCode");
    expect(attributeName("given_1_x")).toBe("given_1_x");
  });
});

describe("compileSpecification", () => {
  test("infers kinds and keeps declaration order", () => {
    const specification = compileSpecification(
      "resource/Encounter",
      `
resourceType: Encounter
identifier_1:
  valueOf: datatype/Identifier
  generateList: true
status:
  valueOf: encounterStatus(discharge, admit, patientClass)
class:
  valueOf: PV1.2
text:
  value: fixed
subject:
  expressionType: reference
  valueOf: $Patient
hospitalization:
  expressionsMap:
    preAdmitIdentifier:
      valueOf: PV1.5
`,
    );

    expect(specification.resourceType).toBe("Encounter");
    expect(specification.members.map((member) => [member.key, member.attribute, member.node.kind])).toEqual([
      ["identifier_1", "identifier", "resource"],
      ["status", "status", "script"],
      ["class", "class", "path"],
      ["text", "text", "constant"],
      ["subject", "subject", "reference"],
      ["hospitalization", "hospitalization", "nested"],
    ]);
  });

  test("integer-like keys keep their source position", () => {
    const specification = compileSpecification(
      "datatype/Ordered",
      `
b:
  value: first
"10":
  valueOf: $z
  vars:
    z: PV1.2
    "7": PV1.3
    a:
      value: 1
nested:
  expressionsMap:
    b:
      value: x
    "10":
      value: y
    2:
      value: z
`,
    );

    expect(specification.members.map((member) => member.key)).toEqual(["b", "10", "nested"]);
    expect(specification.members[1]?.node.vars.map((declaration) => declaration.name)).toEqual(["z", "7", "a"]);

    const nested = specification.members[2]?.node;
    if (nested?.kind !== "nested" || nested.children.form !== "map") throw new Error("expected a nested map");
    expect(nested.children.members.map((member) => member.key)).toEqual(["b", "10", "2"]);
  });

  test("resource specifications default resourceType to their name", () => {
    expect(compileSpecification("resource/Patient", "gender:\n  valueOf: PID.8\n").resourceType).toBe("Patient");
    expect(compileSpecification("datatype/Period", "start:\n  valueOf: $start\n").resourceType).toBeUndefined();
  });

  test("a guard over the node's own vars is evaluated after binding", () => {
    const specification = compileSpecification(
      "resource/Encounter",
      `
serviceProvider:
  condition: $orgIdValue NOT_NULL
  expressionType: reference
  valueOf: resource/Organization
  vars:
    orgIdValue: PV1.3.4.1
reasonReference:
  condition: $Condition NOT_NULL
  expressionType: reference
  valueOf: $Condition
`,
    );

    expect(specification.members.map((member) => member.node.conditionAfterBind)).toEqual([true, false]);
  });

  test("variable descriptors", () => {
    const [member] = compileSpecification(
      "datatype/Test",
      `
value:
  valueOf: $a
  vars:
    a: PV1.19.1 | PID.18.1
    b: STRING, PV1.45
    c: buildIdentifierFromCwe, DG1.3
    d: '$BASE_VALUE, extractAttribute(d, "$.id", "STRING")'
    e: concat(" ", a, b)
    f:
      value: 3
`,
    ).members;

    expect(member?.node.vars.map((declaration) => [declaration.name, declaration.source.kind])).toEqual([
      ["a", "path"],
      ["b", "typed"],
      ["c", "function"],
      ["d", "call"],
      ["e", "call"],
      ["f", "constant"],
    ]);
  });

  test("declaring id is rejected", () => {
    const error = compileError("resource/Patient", "id:\n  valueOf: PID.3.1\n");

    expect(error.resourceKind).toBe("resource/Patient");
    expect(error.attribute).toBe("id");
  });

  test("evaluateLater outside a resource attribute is rejected", () => {
    const nested = compileError(
      "resource/Encounter",
      `
diagnosis:
  expressionsMap:
    condition:
      valueOf: $Condition
      expressionType: reference
      evaluateLater: true
`,
    );
    expect(nested.message).toMatch(/evaluateLater is only allowed/);
    expect(nested.attribute).toBe("diagnosis");

    const datatype = compileError("datatype/Reference", "reference:\n  valueOf: $x\n  evaluateLater: true\n");
    expect(datatype.message).toMatch(/evaluateLater is only allowed/);
  });

  test.each([
    ["unknown key", "code:\n  valueOf: PID.8\n  valeuOf: PID.9\n", /Invalid expression/],
    ["unknown type", "code:\n  valueOf: PID.8\n  type: UUID\n", /Unknown value type "UUID"/],
    ["bad descriptor", "code:\n  valueOf: $x\n  vars:\n    x: Not A Type, PID.8\n", /Cannot read variable descriptor/],
    ["bad guard", "code:\n  valueOf: PID.8\n  condition: $x IS_SET\n", /Malformed condition/],
    ["bad call", "code:\n  valueOf: f(a b)\n", /Malformed script call/],
    ["bad reference", "code:\n  expressionType: reference\n  valueOf: PID.3\n", /Reference valueOf must be/],
    ["both child forms", "code:\n  expressionsMap:\n    a:\n      value: 1\n  expressions:\n    - value: 2\n", /not both/],
    ["constant without value", "code:\n  expressionType: constant\n", /needs a value/],
    ["not a mapping", "- a\n- b\n", /must be a mapping/],
    ["invalid YAML", "code: [unclosed\n", /not valid YAML/],
  ])("%s is a SpecificationError", (_label, yaml, message) => {
    expect(compileError("resource/Test", yaml).message).toMatch(message);
  });
});

describe("specification sets", () => {
  test("an undeclared specification is a SpecificationError", () => {
    const set = createSpecificationSet({ "datatype/Coding": "code:\n  valueOf: $code\n" });

    expect(set.has("datatype/Coding")).toBe(true);
    expect(set.names()).toEqual(["datatype/Coding"]);
    expect(() => set.loadSpecification("datatype/Missing")).toThrow('Undeclared specification "datatype/Missing"');
  });

  describe("loadSpecificationSet", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "specifications-"));
      mkdirSync(join(dir, "resource"));
      mkdirSync(join(dir, "datatype"));
      writeFileSync(join(dir, "resource", "Patient.yml"), "gender:\n  valueOf: PID.8\n");
      writeFileSync(join(dir, "datatype", "Coding.yaml"), "code:\n  valueOf: $code\n");
      writeFileSync(join(dir, "code-tables.json"), "{}");
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    test("names specifications by relative path without extension", () => {
      const set = loadSpecificationSet(dir);

      expect(set.names()).toEqual(["datatype/Coding", "resource/Patient"]);
      expect(set.loadSpecification("resource/Patient").resourceType).toBe("Patient");
    });
  });
});
