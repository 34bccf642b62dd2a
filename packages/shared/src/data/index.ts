// ============================================================================
// Versioned lookup-table files shipped with the shared package.
// ============================================================================

import { readFileSync, existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const VERSION_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/** Absolute path of the PDPM table file for a version label such as "fy2025". */
export function pdpmTableFilePath(version: string): string {
  if (!VERSION_PATTERN.test(version)) {
    throw new Error(`Invalid PDPM table version label: ${version}`);
  }
  return fileURLToPath(new URL(`./pdpm-${version}.json`, import.meta.url));
}

/**
 * Read and JSON-parse a PDPM table file. The result is unvalidated;
 * callers parse it with pdpmTablesSchema.
 * Returns null when no file exists for the version.
 */
export function readPdpmTableFile(version: string): unknown {
  const filePath = pdpmTableFilePath(version);
  if (!existsSync(filePath)) return null;
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return parsed;
}
