#!/usr/bin/env node
// Seed the event store with synthetic interactions
// Usage: tsx scripts/seed.ts [count] [--keep] [--seed=<int>]

import 'dotenv/config';

import { openDatabase } from '../src/db.js';
import { env } from '../src/env.js';
import { SqliteEventStore } from '../src/services/events/index.js';
import { loadSyntheticProfile, seedEventStore } from '../src/services/synthetic-data.js';
import { RNG } from '../src/utils/rng.js';

function parseArgs(argv: string[]) {
  let count = env.SEED_RECORD_COUNT;
  let clearExisting = true;
  let seed: number | undefined;

  for (const arg of argv) {
    if (arg === '--keep') {
      clearExisting = false;
    } else if (arg.startsWith('--seed=')) {
      const parsed = parseInt(arg.slice('--seed='.length), 10);
      if (isNaN(parsed)) throw new Error(`Invalid seed "${arg}"`);
      seed = parsed;
    } else {
      const parsed = parseInt(arg, 10);
      if (isNaN(parsed) || parsed < 0) throw new Error(`Invalid record count "${arg}"`);
      count = parsed;
    }
  }

  return { count, clearExisting, seed };
}

const formatRate = (conversions: number, sessions: number) =>
  sessions > 0 ? `${((conversions / sessions) * 100).toFixed(1)}%` : 'n/a';

async function main() {
  const { count, clearExisting, seed } = parseArgs(process.argv.slice(2));
  const database = openDatabase(env.DATABASE_PATH);

  try {
    console.log(`Generating ${count} synthetic interactions...`);
    const profile = await loadSyntheticProfile(env.SYNTHETIC_PROFILE_PATH);
    const summary = await seedEventStore(new SqliteEventStore(database.db), {
      count,
      profile,
      rng: new RNG(seed),
      clearExisting,
    });

    const { sessions, conversions } = summary;
    console.log(`\nGenerated ${summary.generated} records`);
    console.log(`  Crisis protocol triggered: ${summary.crisis}`);
    console.log(`  Variant A (Clinical): ${sessions.A_CLINICAL} sessions, ${conversions.A_CLINICAL} conversions, ${formatRate(conversions.A_CLINICAL, sessions.A_CLINICAL)}`);
    console.log(`  Variant B (Empathetic): ${sessions.B_EMPATHETIC} sessions, ${conversions.B_EMPATHETIC} conversions, ${formatRate(conversions.B_EMPATHETIC, sessions.B_EMPATHETIC)}`);
    console.log(`  Database: ${env.DATABASE_PATH}`);
  } finally {
    database.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
