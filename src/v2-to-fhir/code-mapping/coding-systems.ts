/**
 * Coding System Utilities
 *
 * Shared functions for normalizing HL7v2 coding systems to FHIR URIs.
 */

const HL7_TABLE_PREFIX = /^HL7(\d{4})$/;

/**
 * Normalize HL7v2 coding system abbreviations to standard FHIR system URIs.
 *
 * Common mappings:
 * - "LN" / "LOINC" → http://loinc.org
 * - "SCT" / "SNOMED" / "SNOMEDCT" → http://snomed.info/sct
 * - "ICD10" / "I10" → http://hl7.org/fhir/sid/icd-10
 * - "HL70004" → http://terminology.hl7.org/CodeSystem/v2-0004
 *
 * @returns FHIR system URI or original value if no mapping exists
 */
export function normalizeSystem(system: string | undefined): string | undefined {
  if (!system) return undefined;

  const upper = system.toUpperCase();
  if (upper === "LN" || upper === "LOINC") {
    return "http://loinc.org";
  }
  if (upper === "SCT" || upper === "SNOMED" || upper === "SNOMEDCT") {
    return "http://snomed.info/sct";
  }
  if (upper === "ICD10" || upper === "I10") {
    return "http://hl7.org/fhir/sid/icd-10";
  }
  if (upper === "ICD10CM" || upper === "I10C") {
    return "http://hl7.org/fhir/sid/icd-10-cm";
  }
  if (upper === "ICD9" || upper === "I9" || upper === "I9C") {
    return "http://hl7.org/fhir/sid/icd-9-cm";
  }
  if (upper === "UCUM") {
    return "http://unitsofmeasure.org";
  }

  const table = HL7_TABLE_PREFIX.exec(upper);
  if (table) {
    return `http://terminology.hl7.org/CodeSystem/v2-${table[1]}`;
  }

  return system;
}

/**
 * System URL for a value typed SYSTEM_URL: URIs pass through, known
 * abbreviations are normalized, anything else becomes a local `urn:id:`.
 */
export function toSystemUrl(system: string | undefined): string | undefined {
  const trimmed = system?.trim();
  if (!trimmed) return undefined;
  if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed)) return trimmed;

  const normalized = normalizeSystem(trimmed);
  if (normalized !== undefined && normalized !== trimmed) return normalized;

  return `urn:id:${trimmed.replace(/\s+/g, "_")}`;
}
