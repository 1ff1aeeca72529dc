#!/usr/bin/env tsx
// ─── Validate Catalog ──────────────────────────────────────────────
// CLI script that validates the joker catalog (data/jokers.json, or the
// path given as the first argument) against the schema and the shipped
// definitions. Exits 0 if every joker passes, 1 if any fail.

import { RARITIES } from "../packages/schema/src/index";
import {
  ALL_DEFINITIONS,
  BehaviorRegistry,
  CATALOG_PATH,
  JesterError,
  readCatalog,
} from "../packages/engine/src/index";

function main(): void {
  const path = process.argv[2] ?? CATALOG_PATH;
  console.log(`\nValidating joker catalog ${path}...\n`);

  let registry: BehaviorRegistry;
  try {
    registry = BehaviorRegistry.build(readCatalog(path), ALL_DEFINITIONS);
  } catch (err) {
    if (!(err instanceof JesterError)) throw err;
    console.error(`  ❌ ${err.message}`);
    process.exit(1);
  }

  let failed = 0;

  for (const id of registry.ids()) {
    const entry = registry.entry(id);
    if (entry === undefined) continue;

    try {
      const behavior = entry.construct();
      const copyable = behavior.gameplay !== undefined;
      if (entry.identity.copyable !== copyable) {
        console.error(`  ❌ ${id} — copyable is ${entry.identity.copyable} but the joker ${copyable ? "has" : "has no"} gameplay hooks`);
        failed++;
        continue;
      }
      console.log(`  ✅ ${id}`);
    } catch (err) {
      if (!(err instanceof JesterError)) throw err;
      console.error(`  ❌ ${id} — ${err.message}`);
      failed++;
    }
  }

  console.log();
  for (const rarity of RARITIES) {
    console.log(`  ${rarity}: ${registry.byRarity(rarity).length}`);
  }
  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${registry.size} joker(s) failed validation.`);
    process.exit(1);
  }

  console.log(`All ${registry.size} joker(s) passed validation.`);
}

main();
