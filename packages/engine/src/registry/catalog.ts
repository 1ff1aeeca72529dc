// ─── Catalog Loader ────────────────────────────────────────────────
// Reads the shipped joker catalog (data/jokers.json) and validates it
// against the schema package's catalog schema.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { JokerMetadata } from "@jester/schema";
import { formatZodIssues, safeParseCatalog } from "@jester/schema";
import { CatalogError } from "../errors";

export const CATALOG_PATH = fileURLToPath(new URL("../../data/jokers.json", import.meta.url));

/**
 * Validates parsed catalog JSON.
 *
 * @throws {CatalogError} listing every schema violation.
 */
export function parseCatalogJson(raw: unknown): readonly JokerMetadata[] {
  const result = safeParseCatalog(raw);
  if (!result.success) {
    throw new CatalogError(formatZodIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Reads and validates the catalog file.
 *
 * @throws {CatalogError} when the file is unreadable, not JSON, or invalid.
 */
export function readCatalog(path: string = CATALOG_PATH): readonly JokerMetadata[] {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Failed to read catalog: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new CatalogError(`Catalog is not valid JSON: ${path}`);
  }
  return parseCatalogJson(json);
}
