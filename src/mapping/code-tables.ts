import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { CodeTables } from "./script-functions";

const CodeTablesSchema = z.record(
  z.record(
    z
      .object({
        code: z.string().min(1),
        display: z.string().optional(),
        system: z.string().optional(),
      })
      .strict(),
  ),
);

export const CODE_TABLES_FILE = "code-tables.json";

/**
 * Code tables used by `codeLookup`. A missing file means no tables; a file
 * that does not match the expected shape is a startup error.
 */
export function loadCodeTables(file: string): CodeTables {
  if (!existsSync(file)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error";
    throw new Error(`Failed to parse code tables ${file}: ${message}`);
  }

  const result = CodeTablesSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "<root>";
    throw new Error(`Invalid code tables ${file} at ${where}: ${issue?.message ?? "unknown error"}`);
  }
  return result.data;
}
