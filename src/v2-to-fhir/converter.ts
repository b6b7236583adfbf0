/**
 * HL7v2 to FHIR Converter Router
 *
 * Routes HL7v2 messages to their message template by type (MSH-9) and runs
 * the mapping engine over it. Supported types are the keys of
 * config.messages.
 */

import { Hl7v2Document } from "../hl7v2/document";
import type { FinalizedResource } from "../mapping/assembler";
import type { Diagnostic } from "../mapping/conversion-context";
import { runConversion } from "../mapping/engine";
import { createConverterContext, type ConverterContext } from "./converter-context";
import { toTransactionBundle, type Bundle } from "./fhir-bundle";

export interface ConversionResult {
  bundle: Bundle;
  resources: FinalizedResource[];
  diagnostics: Diagnostic[];
}

/**
 * Extract message type from MSH-9
 * Returns message type in format: ADT-A01, ORU-R01, etc.
 */
function extractMessageType(document: Hl7v2Document): string {
  const messageType = document.messageType();
  if (!messageType) {
    throw new Error("Message type not found in MSH-9");
  }
  return messageType;
}

/**
 * Convert an HL7v2 message and keep the per-node diagnostics next to the
 * bundle.
 *
 * @throws Error if message type is unsupported
 * @throws SourceDataError / SpecificationError when the run cannot complete
 */
export function convertMessage(
  message: string,
  context: ConverterContext = createConverterContext(),
): ConversionResult {
  const document = Hl7v2Document.fromString(message);
  const messageType = extractMessageType(document);

  const messageConfig = context.config.messages[messageType];
  if (!messageConfig) {
    throw new Error(`Unsupported message type: ${messageType}`);
  }

  const { resources, diagnostics } = runConversion(document, messageConfig.resources, {
    specifications: context.specifications,
    scripts: context.scripts,
    logger: context.logger,
    constants: context.config.constants,
    controlId: document.controlId(),
  });

  return { bundle: toTransactionBundle(resources), resources, diagnostics };
}

/**
 * Convert HL7v2 message to FHIR Bundle
 *
 * @param message - Raw HL7v2 message string
 * @returns FHIR R4 Transaction Bundle
 * @throws Error if message type is unsupported
 */
export function convertToFHIR(message: string, context?: ConverterContext): Bundle {
  return convertMessage(message, context).bundle;
}

export default convertToFHIR;

export type { Bundle, BundleEntry } from "./fhir-bundle";
