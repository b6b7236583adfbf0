export * from "./v2-to-fhir";
export { Hl7v2Document, type SourceDocument } from "./hl7v2/document";
export { parseMessage } from "./hl7v2/parser";
export type { FieldValue, HL7v2Message, HL7v2Segment } from "./hl7v2/types";
export { BundleAssembler, type FinalizedResource } from "./mapping/assembler";
export type { Diagnostic, DiagnosticKind } from "./mapping/conversion-context";
export { runConversion, type RunOptions, type RunResult, type TemplateResource } from "./mapping/engine";
export { MappingError, ScriptEvaluationError, SourceDataError, SpecificationError } from "./mapping/errors";
export { consoleLogger, silentLogger, type ConversionLogger } from "./mapping/logger";
export { ScriptRegistry, type ScriptBridge, type ScriptFunction } from "./mapping/script-bridge";
export { createBuiltinFunctions, type CodeTables } from "./mapping/script-functions";
export type { Specification, SpecificationSet } from "./mapping/specification";
export { createSpecificationSet, loadSpecificationSet } from "./mapping/specification-loader";
