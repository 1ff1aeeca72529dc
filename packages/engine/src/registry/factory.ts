// ─── Behavior Factory ──────────────────────────────────────────────
// Builds fresh behavior instances from identifiers. Construction reads
// the registry and touches nothing else.

import { ConstructionError } from "../errors";
import type { Behavior } from "../types/behavior";
import { getRegistry, type BehaviorRegistry } from "./registry";

/** Result of a construction attempt. Discriminated union. */
export type CreateResult =
  | { readonly ok: true; readonly behavior: Behavior }
  | { readonly ok: false; readonly error: ConstructionError };

/**
 * A new instance of joker `id`.
 *
 * @throws {ConstructionError} `unknown_identifier` when `id` is not
 * registered, `invalid_arguments` or `invalid_definition` from the
 * joker's own construction.
 */
export function createBehavior(
  id: string,
  args?: unknown,
  registry: BehaviorRegistry = getRegistry()
): Behavior {
  const entry = registry.has(id) ? registry.entry(id) : undefined;
  if (entry === undefined) {
    throw new ConstructionError(`Unknown joker identifier: "${id}"`, "unknown_identifier", id);
  }
  return entry.construct(args);
}

export function tryCreateBehavior(
  id: string,
  args?: unknown,
  registry: BehaviorRegistry = getRegistry()
): CreateResult {
  try {
    return { ok: true, behavior: createBehavior(id, args, registry) };
  } catch (err) {
    if (err instanceof ConstructionError) return { ok: false, error: err };
    throw err;
  }
}
