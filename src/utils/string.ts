/**
 * Shared string utility functions
 */

/**
 * Convert string to kebab-case
 * "Essential Hypertension" → "essential-hypertension"
 * "LAB_SYSTEM" → "lab-system"
 * "MedicationRequest" → "medication-request"
 */
export function toKebabCase(str: string): string {
  return str
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2") // Split camelCase words
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "-") // Replace non-alphanumeric chars (including underscores) with hyphens
    .replace(/\s+/g, "-") // Replace spaces with hyphens
    .replace(/-+/g, "-") // Collapse multiple hyphens
    .replace(/^-|-$/g, ""); // Trim leading/trailing hyphens
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
