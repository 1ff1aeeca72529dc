#!/usr/bin/env tsx
// ─── Simulate Runs ─────────────────────────────────────────────────
// Determinism smoke run. Plays a few seeded rounds per seed twice, once
// on a worker thread and once on the main thread, and compares the
// digests. Each worker builds its own registry. Usage:
//   tsx scripts/simulate-runs.ts [seeds=8] [rounds=3]
// Exits 1 if any seed produced two different digests.

import { Worker, isMainThread, parentPort, workerData } from "node:worker_threads";
import { fileURLToPath } from "node:url";
import { RANKS, SUITS, type PlayingCard } from "../packages/schema/src/index";
import { JokerRun, SeededRng, createRunSnapshot } from "../packages/engine/src/index";
import { makeCard, makeCardId } from "../packages/engine/src/testing/fixtures";

const POOL = [
  "joker",
  "greedy_joker",
  "hack",
  "ice_cream",
  "campfire",
  "ride_the_bus",
  "misprint",
  "blueprint",
  "green_joker",
  "hit_the_road",
] as const;

const JOKERS_PER_RUN = 5;
const HANDS_PER_ROUND = 4;
const HAND_SIZE = 8;

interface SimulationInput {
  readonly seed: number;
  readonly rounds: number;
}

interface SimulationDigest {
  readonly seed: number;
  readonly total: number;
  readonly hands: number;
  readonly jokers: readonly string[];
  readonly state: string;
}

function freshDeck(): PlayingCard[] {
  return SUITS.flatMap((suit) => RANKS.map((rank) => makeCard(rank, suit, { id: makeCardId(`${rank}-${suit}`) })));
}

function simulate({ seed, rounds }: SimulationInput): SimulationDigest {
  const rng = new SeededRng(seed);
  const run = new JokerRun({ seed });
  for (const id of rng.shuffle(POOL).slice(0, JOKERS_PER_RUN)) run.acquire(id);

  const fullDeck = freshDeck();
  let total = 0;
  let hands = 0;

  for (let round = 1; round <= rounds; round++) {
    let deck = rng.shuffle(fullDeck);
    let discardsUsed = 0;
    const at = (handsPlayed: number) =>
      createRunSnapshot({
        seed,
        round,
        handsPlayed,
        handsRemaining: HANDS_PER_ROUND - handsPlayed - 1,
        discardsUsed,
        discardsRemaining: Math.max(0, 3 - discardsUsed),
        deck,
        fullDeck,
        roundScore: total,
      });

    run.startRound(at(0));
    for (let hand = 0; hand < HANDS_PER_ROUND && deck.length >= HAND_SIZE; hand++) {
      const drawn = deck.slice(0, HAND_SIZE);
      deck = deck.slice(HAND_SIZE);
      const count = rng.nextInt(1, 6);
      let held = drawn.slice(count);

      if (rng.chance(1, 4) && discardsUsed < 3) {
        run.discard(held, at(hand));
        discardsUsed++;
        held = [];
      }
      const result = run.process({ played: drawn.slice(0, count), held }, at(hand));
      total += result.score.score;
      hands++;
    }
    run.endRound(at(HANDS_PER_ROUND - 1));
  }

  return {
    seed,
    total,
    hands,
    jokers: run.handles().map((h) => h.id),
    state: JSON.stringify(run.serializeAll().entries),
  };
}

function isSimulationInput(value: unknown): value is SimulationInput {
  return (
    typeof value === "object" &&
    value !== null &&
    "seed" in value &&
    typeof value.seed === "number" &&
    "rounds" in value &&
    typeof value.rounds === "number"
  );
}

function inWorker(input: SimulationInput): Promise<SimulationDigest> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(fileURLToPath(import.meta.url), { workerData: input });
    worker.once("message", (digest: SimulationDigest) => resolve(digest));
    worker.once("error", reject);
    worker.once("exit", (code) => {
      if (code !== 0) reject(new Error(`Worker for seed ${input.seed} exited with code ${code}`));
    });
  });
}

function sameDigest(a: SimulationDigest, b: SimulationDigest): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

async function main(): Promise<void> {
  const seeds = Number(process.argv[2] ?? 8);
  const rounds = Number(process.argv[3] ?? 3);
  console.log(`\nSimulating ${seeds} seed(s), ${rounds} round(s) each...\n`);

  const inputs = Array.from({ length: seeds }, (_, i) => ({ seed: 1000 + i, rounds }));
  const remote = await Promise.all(inputs.map(inWorker));

  let failed = 0;
  for (const [index, input] of inputs.entries()) {
    const local = simulate(input);
    const other = remote[index];
    if (other === undefined || !sameDigest(local, other)) {
      console.error(`  ❌ seed ${input.seed} — worker and main thread disagree`);
      failed++;
      continue;
    }
    console.log(`  ✅ seed ${input.seed} — ${local.hands} hands, ${local.total} chips, [${local.jokers.join(", ")}]`);
  }

  console.log();
  if (failed > 0) {
    console.error(`${failed} of ${seeds} seed(s) were not deterministic.`);
    process.exit(1);
  }
  console.log(`All ${seeds} seed(s) were deterministic.`);
}

if (isMainThread) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
} else if (isSimulationInput(workerData)) {
  parentPort?.postMessage(simulate(workerData));
} else {
  throw new Error("Simulation worker started without a seed");
}
