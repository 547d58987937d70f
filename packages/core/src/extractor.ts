/**
 * Result extraction from a completed workload's status.
 */

import {
  MissingResultError,
  ResultConflictError,
  UnreferencedResultError,
  VerificationMismatchError,
} from "./errors.js";
import type { ResultEntry, WorkloadSnapshot } from "./schemas/index.js";

function isReferenced(entry: ResultEntry): boolean {
  return Boolean(entry.resourceRef?.name);
}

/**
 * Pull the requested keys out of `status.resourcesResult`.
 *
 * Only entries carrying a resource reference count. Entry order is
 * irrelevant, so a key reported twice with different values is a conflict
 * rather than "first wins". Every entry, requested or not, must be
 * referenced.
 *
 * @throws MissingResultError when a requested key has no referenced entry
 * @throws ResultConflictError when a requested key has two different values
 * @throws UnreferencedResultError when any entry has no reference
 */
export function extractResults(
  snapshot: WorkloadSnapshot,
  expectedKeys: Iterable<string>,
): Record<string, string> {
  const identity = {
    name: snapshot.metadata.name,
    namespace: snapshot.metadata.namespace,
  };
  const requested = new Set(expectedKeys);
  const values = new Map<string, Set<string>>();
  const unreferenced = new Set<string>();

  for (const entry of snapshot.status.resourcesResult) {
    if (!isReferenced(entry)) {
      unreferenced.add(entry.key);
      continue;
    }
    if (!requested.has(entry.key)) continue;
    const seen = values.get(entry.key) ?? new Set<string>();
    seen.add(entry.value);
    values.set(entry.key, seen);
  }

  const missing = [...requested].filter((key) => !values.has(key));
  const [firstMissing] = missing;
  if (firstMissing !== undefined) {
    throw new MissingResultError(firstMissing, missing, identity);
  }

  const results: Record<string, string> = {};
  for (const key of requested) {
    const seen = [...(values.get(key) ?? [])];
    if (seen.length > 1) {
      throw new ResultConflictError(key, seen.sort(), identity);
    }
    results[key] = seen[0] ?? "";
  }

  if (unreferenced.size > 0) {
    throw new UnreferencedResultError([...unreferenced].sort(), identity);
  }

  return results;
}

/**
 * Compare one extracted result with a locally known value.
 */
export function expectResultValue(
  results: Record<string, string>,
  key: string,
  expected: string,
): void {
  const actual = results[key] ?? "";
  if (actual !== expected) {
    throw new VerificationMismatchError(expected, actual, key);
  }
}
