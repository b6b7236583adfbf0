export { convertMessage, convertToFHIR, type ConversionResult } from "./converter";
export { createConverterContext, specificationsFor, type ConverterContext } from "./converter-context";
export { clearConfigCache, hl7v2ToFhirConfig, type Hl7v2ToFhirConfig, type MessageTypeConfig } from "./config";
export { createBundleEntry, toTransactionBundle, type Bundle, type BundleEntry, type Resource } from "./fhir-bundle";
