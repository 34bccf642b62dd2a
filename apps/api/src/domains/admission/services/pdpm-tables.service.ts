// ============================================================================
// PDPM Lookup Tables — Loader
// Tables are immutable versioned data: each version is read, validated and
// frozen once per process, then passed explicitly into pipeline calls.
// ============================================================================

import { readPdpmTableFile } from '@snfadmit/shared/data/index.js';
import {
  pdpmTablesSchema,
  type PdpmTables,
} from '@snfadmit/shared/schemas/validation/pdpm-tables.validation.js';
import { ConfigurationIntegrityError } from '../../../lib/errors.js';

const cache = new Map<string, Readonly<PdpmTables>>();

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate raw table data (already parsed JSON). Exposed so tests and
 * tooling can build tables from inline fixtures.
 */
export function parsePdpmTables(raw: unknown, source = 'inline'): Readonly<PdpmTables> {
  const result = pdpmTablesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationIntegrityError(
      `PDPM tables from ${source} failed validation`,
      result.error.flatten(),
    );
  }
  return deepFreeze(result.data);
}

/** Load (and cache) the tables for a version label such as "fy2025". */
export function loadPdpmTables(version: string): Readonly<PdpmTables> {
  const cached = cache.get(version);
  if (cached) return cached;

  let raw: unknown;
  try {
    raw = readPdpmTableFile(version);
  } catch (err) {
    throw new ConfigurationIntegrityError(
      `PDPM tables for version "${version}" could not be read`,
      { version, reason: err instanceof Error ? err.message : String(err) },
    );
  }
  if (raw === null) {
    throw new ConfigurationIntegrityError(
      `No PDPM tables found for version "${version}"`,
      { version },
    );
  }

  const tables = parsePdpmTables(raw, `version "${version}"`);
  if (tables.version !== version) {
    throw new ConfigurationIntegrityError(
      `PDPM table file for "${version}" declares version "${tables.version}"`,
      { version, declared: tables.version },
    );
  }
  cache.set(version, tables);
  return tables;
}
