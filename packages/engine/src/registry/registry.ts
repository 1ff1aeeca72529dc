// ─── Behavior Registry ─────────────────────────────────────────────
// Identifier → { metadata, construct } for every joker kind. A registry
// is built once from the catalog and the definition modules, frozen,
// and then only read. The process-wide instance is published through
// getRegistry(); runs and the factory also accept an explicit handle.

import type {
  JokerId,
  JokerMetadata,
  Rarity,
  UnlockCondition,
} from "@jester/schema";
import { JOKER_IDS } from "@jester/schema";
import { CatalogError } from "../errors";
import { identityFrom, type JokerDefinition } from "../frameworks/definition";
import { ALL_DEFINITIONS } from "../jokers/index";
import { logger } from "../logger";
import type { Behavior, Identity } from "../types/behavior";
import { readCatalog } from "./catalog";

export interface RegistryEntry {
  readonly metadata: JokerMetadata;
  readonly identity: Identity;
  readonly parameterized: boolean;
  /** @throws {ConstructionError} when `args` do not validate. */
  construct(args?: unknown): Behavior;
}

/** What the shop knows about the run when it filters by unlock. */
export interface UnlockProgress {
  readonly ante: number;
  readonly flags: readonly string[];
}

export function isUnlocked(unlock: UnlockCondition, progress: UnlockProgress): boolean {
  switch (unlock.kind) {
    case "always":
      return true;
    case "min_ante":
      return progress.ante >= unlock.ante;
    case "run_flag":
      return progress.flags.includes(unlock.flag);
    case "never_in_shop":
      return false;
  }
}

export class BehaviorRegistry {
  private constructor(private readonly entries: ReadonlyMap<string, RegistryEntry>) {}

  /**
   * Pairs every catalog entry with its definition.
   *
   * @throws {CatalogError} when an identifier lacks metadata or a
   * definition, or is defined twice.
   */
  static build(
    catalog: readonly JokerMetadata[],
    definitions: readonly JokerDefinition[]
  ): BehaviorRegistry {
    const byId = new Map<JokerId, JokerDefinition>();
    for (const definition of definitions) {
      if (byId.has(definition.id)) {
        throw new CatalogError(`Joker "${definition.id}" is defined twice`);
      }
      byId.set(definition.id, definition);
    }

    const entries = new Map<string, RegistryEntry>();
    for (const metadata of catalog) {
      const definition = byId.get(metadata.id);
      if (definition === undefined) {
        throw new CatalogError(`Catalog entry "${metadata.id}" has no definition`);
      }
      const identity = identityFrom(metadata);
      entries.set(
        metadata.id,
        Object.freeze({
          metadata: Object.freeze({ ...metadata, unlock: Object.freeze({ ...metadata.unlock }) }),
          identity,
          parameterized: definition.parameterized,
          construct: (args?: unknown) => definition.build(identity, args),
        })
      );
    }
    for (const id of byId.keys()) {
      if (!entries.has(id)) throw new CatalogError(`Joker "${id}" has no catalog entry`);
    }
    return new BehaviorRegistry(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): id is JokerId {
    return this.entries.has(id);
  }

  entry(id: JokerId): RegistryEntry | undefined {
    return this.entries.get(id);
  }

  metadata(id: JokerId): JokerMetadata | undefined {
    return this.entries.get(id)?.metadata;
  }

  /** Identifiers in catalog declaration order. */
  ids(): readonly JokerId[] {
    return JOKER_IDS.filter((id) => this.entries.has(id));
  }

  byRarity(rarity: Rarity): readonly JokerMetadata[] {
    return this.eligibleFor((m) => m.rarity === rarity);
  }

  eligibleFor(predicate: (metadata: JokerMetadata) => boolean): readonly JokerMetadata[] {
    const result: JokerMetadata[] = [];
    for (const id of this.ids()) {
      const metadata = this.metadata(id);
      if (metadata !== undefined && predicate(metadata)) result.push(metadata);
    }
    return result;
  }
}

// ─── Process-Wide Instance ─────────────────────────────────────────

let published: BehaviorRegistry | undefined;

/**
 * The process-wide registry, built from the shipped catalog on first
 * call. Later calls return the same instance.
 */
export function getRegistry(): BehaviorRegistry {
  if (published === undefined) {
    const registry = BehaviorRegistry.build(readCatalog(), ALL_DEFINITIONS);
    published = registry;
    logger.debug("Joker registry published", { jokers: registry.size });
  }
  return published;
}

/** Drops the published registry so the next getRegistry() rebuilds it. */
export function resetRegistryForTests(): void {
  published = undefined;
}
