import { describe, test, expect } from "vitest";
import { convertToFHIR } from "../../../src/v2-to-fhir/converter";
import { createBundleEntry } from "../../../src/v2-to-fhir/fhir-bundle";
import { makeTestContext } from "./helpers";

function header(messageType: string, controlId: string): string {
  return `MSH|^~\\&|HIS|GENERAL|EHR|GENERAL|20240105083000||${messageType}|${controlId}|P|2.5`;
}

describe("convertToFHIR", () => {
  test("routes ADT^A08 through its template", () => {
    const bundle = convertToFHIR([header("ADT^A08", "UPD1"), "PID|1||P300", "PV1|1|E"].join("\r"), makeTestContext());

    expect(bundle.entry.map((entry) => entry.request.url)).toEqual([
      "Patient/patient-1-upd1",
      "Encounter/encounter-1-upd1",
    ]);
  });

  test("only the resources of the configured template are built", () => {
    const context = makeTestContext();
    const onlyPatient = makeTestContext({
      config: {
        ...context.config,
        messages: { "ADT-A01": { resources: [{ resourceName: "Patient", segment: "PID" }] } },
      },
    });

    const bundle = convertToFHIR([header("ADT^A01", "M1"), "PID|1||P300", "PV1|1|E"].join("\r"), onlyPatient);

    expect(bundle.entry.map((entry) => entry.resource.resourceType)).toEqual(["Patient"]);
  });

  test("unsupported message type throws", () => {
    expect(() => convertToFHIR([header("ORU^R01", "M2"), "PID|1"].join("\r"), makeTestContext())).toThrow(
      "Unsupported message type: ORU-R01",
    );
  });

  test("missing MSH-9 throws", () => {
    expect(() => convertToFHIR([header("", "M3"), "PID|1"].join("\r"), makeTestContext())).toThrow(
      "Message type not found in MSH-9",
    );
  });
});

describe("createBundleEntry", () => {
  test("PUT to the resource url by default", () => {
    expect(createBundleEntry({ resourceType: "Patient", id: "patient-1" }).request).toEqual({
      method: "PUT",
      url: "Patient/patient-1",
    });
  });

  test("POST to the type url when the resource has no id", () => {
    expect(createBundleEntry({ resourceType: "Observation" }, "POST").request).toEqual({
      method: "POST",
      url: "Observation",
    });
  });
});
