import { readFileSync } from 'fs';
import { CatalogError } from '../errors.js';
import type { ActivityDefinition, CatalogDefinition } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseActivity(name: string, entry: unknown): ActivityDefinition {
  if (!isRecord(entry)) {
    throw new CatalogError(`activity "${name}": entry must be an object`);
  }

  const { description, schedule, max_participants, participants } = entry;

  if (typeof description !== 'string') {
    throw new CatalogError(`activity "${name}": description must be a string`);
  }
  if (typeof schedule !== 'string') {
    throw new CatalogError(`activity "${name}": schedule must be a string`);
  }
  if (typeof max_participants !== 'number' || !Number.isInteger(max_participants) || max_participants <= 0) {
    throw new CatalogError(`activity "${name}": max_participants must be a positive integer`);
  }
  if (!Array.isArray(participants)) {
    throw new CatalogError(`activity "${name}": participants must be an array`);
  }

  const roster: string[] = [];
  for (const email of participants) {
    if (typeof email !== 'string') {
      throw new CatalogError(`activity "${name}": participants must be strings`);
    }
    if (roster.includes(email)) {
      throw new CatalogError(`activity "${name}": duplicate participant ${email}`);
    }
    roster.push(email);
  }

  return { description, schedule, max_participants, participants: roster };
}

/**
 * Validate an already-parsed catalog value. Rosters may start above
 * max_participants; the ceiling is informational only.
 */
export function parseCatalog(raw: unknown): CatalogDefinition {
  if (!isRecord(raw)) {
    throw new CatalogError('catalog must be an object keyed by activity name');
  }

  const catalog: CatalogDefinition = {};
  for (const [name, entry] of Object.entries(raw)) {
    if (!name.trim()) {
      throw new CatalogError('activity names must not be empty');
    }
    // defineProperty keeps a "__proto__" key as an ordinary activity
    Object.defineProperty(catalog, name, {
      value: parseActivity(name, entry),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return catalog;
}

export function loadCatalog(filePath: string): CatalogDefinition {
  let data: string;
  try {
    data = readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`cannot read catalog file ${filePath}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    throw new CatalogError(`catalog file ${filePath} is not valid JSON`);
  }

  return parseCatalog(parsed);
}

/** Startup variant of loadCatalog: prints catalog problems and exits, like validateConfig. */
export function loadCatalogOrExit(filePath: string): CatalogDefinition {
  try {
    return loadCatalog(filePath);
  } catch (err) {
    if (!(err instanceof CatalogError)) throw err;
    console.error(`Invalid catalog: ${err.message}`);
    console.error('Check CATALOG_FILE in your .env file. See .env.example');
    process.exit(1);
  }
}
