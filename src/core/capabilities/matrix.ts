import { AdvisorError, formatIssues } from '../errors.js';
import { readJsonFile } from '../readJsonFile.js';
import type { CapabilityCategory, CapabilityStatus, Environment } from '../report/reportTypes.js';
import { sortBy } from '../../util/index.js';
import { environmentRank, matchEnvironment } from './environment.js';
import { capabilitySourceSchema } from './schema.js';

/** All rows for one capability, keyed by environment. */
export interface CapabilityEntry {
  readonly name: string;
  readonly category: CapabilityCategory;
  readonly byEnvironment: ReadonlyMap<Environment, CapabilityStatus>;
}

interface MutableEntry extends CapabilityEntry {
  readonly byEnvironment: Map<Environment, CapabilityStatus>;
}

/** The loaded capability matrix. Keys are normalized capability names. */
export interface CapabilityMatrix {
  readonly entries: ReadonlyMap<string, CapabilityEntry>;
  readonly sourcePath: string | null;
}

/** Filter for listing capabilities. */
export interface CapabilityFilter {
  readonly environment?: Environment | undefined;
  readonly category?: CapabilityCategory | undefined;
}

/** Lookup key for a capability name: case-insensitive, whitespace collapsed. */
export function normalizeCapabilityName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Read and validate a capability source JSON file. */
export function loadCapabilityMatrix(filePath: string): CapabilityMatrix {
  return parseCapabilitySource(readJsonFile(filePath), filePath);
}

/**
 * Validate an already-parsed capability source and build the matrix.
 * Rejects duplicate (name, environment) pairs with DUPLICATE_CAPABILITY_ENTRY.
 */
export function parseCapabilitySource(raw: unknown, sourcePath: string | null = null): CapabilityMatrix {
  const parsed = capabilitySourceSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new AdvisorError('MALFORMED_SOURCE', `Capability source is malformed: ${issues.join('; ')}`, {
      sourcePath,
      issues,
    });
  }

  const entries = new Map<string, MutableEntry>();

  for (const row of parsed.data.capabilities) {
    const key = normalizeCapabilityName(row.name);
    const entry: MutableEntry = entries.get(key) ?? {
      name: row.name,
      category: row.category,
      byEnvironment: new Map<Environment, CapabilityStatus>(),
    };

    if (entry.byEnvironment.has(row.environment)) {
      throw new AdvisorError(
        'DUPLICATE_CAPABILITY_ENTRY',
        `Capability "${row.name}" is declared twice for ${row.environment}.`,
        { sourcePath, name: row.name, environment: row.environment },
      );
    }
    if (entry.category !== row.category) {
      throw new AdvisorError(
        'MALFORMED_SOURCE',
        `Capability "${row.name}" is filed under both ${entry.category} and ${row.category}.`,
        { sourcePath, name: row.name },
      );
    }

    entry.byEnvironment.set(
      row.environment,
      Object.freeze({
        name: entry.name,
        category: entry.category,
        environment: row.environment,
        status: row.status,
        constraintNote: row.note ?? null,
      }),
    );
    entries.set(key, entry);
  }

  const frozen = new Map<string, CapabilityEntry>();
  for (const [key, entry] of entries) {
    frozen.set(key, Object.freeze({ ...entry }));
  }
  return Object.freeze({ entries: frozen, sourcePath });
}

/**
 * Resolve a capability in one environment.
 *
 * Fails with UNKNOWN_CAPABILITY when the name has no rows at all, and with
 * UNKNOWN_ENVIRONMENT when the name is known but has no row for the
 * environment, including an environment outside the matrix.
 */
export function resolveCapability(matrix: CapabilityMatrix, name: string, environment: string): CapabilityStatus {
  const entry = requireEntry(matrix, name, environment);
  const matched = matchEnvironment(environment);
  const status = matched !== undefined ? entry.byEnvironment.get(matched) : undefined;
  if (status === undefined) {
    const declared = sortEnvironments([...entry.byEnvironment.keys()]);
    const shown = matched ?? environment;
    throw new AdvisorError(
      'UNKNOWN_ENVIRONMENT',
      `Capability "${entry.name}" has no entry for ${shown} (declared: ${declared.join(', ')}).`,
      { name: entry.name, environment: shown, declared },
    );
  }
  return status;
}

/** Every environment row of a capability, in matrix order. */
export function compareCapability(matrix: CapabilityMatrix, name: string): readonly CapabilityStatus[] {
  const entry = requireEntry(matrix, name);
  return sortEnvironments([...entry.byEnvironment.keys()]).flatMap((env) => {
    const status = entry.byEnvironment.get(env);
    return status !== undefined ? [status] : [];
  });
}

/** List capability rows, sorted by name then environment. */
export function listCapabilities(matrix: CapabilityMatrix, filter: CapabilityFilter = {}): readonly CapabilityStatus[] {
  const rows: CapabilityStatus[] = [];
  for (const entry of matrix.entries.values()) {
    if (filter.category !== undefined && entry.category !== filter.category) {
      continue;
    }
    for (const status of entry.byEnvironment.values()) {
      if (filter.environment === undefined || status.environment === filter.environment) {
        rows.push(status);
      }
    }
  }
  return sortBy(rows, (s) => [normalizeCapabilityName(s.name), environmentRank(s.environment)]);
}

function requireEntry(matrix: CapabilityMatrix, name: string, environment?: string): CapabilityEntry {
  const entry = matrix.entries.get(normalizeCapabilityName(name));
  if (entry === undefined) {
    const context = environment !== undefined ? { name, environment } : { name };
    throw new AdvisorError('UNKNOWN_CAPABILITY', `Unknown capability "${name}".`, context);
  }
  return entry;
}

function sortEnvironments(environments: readonly Environment[]): Environment[] {
  return sortBy(environments, environmentRank);
}
