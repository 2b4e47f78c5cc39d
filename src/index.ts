// Triage Experiment API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { openDatabase } from './db.js';
import { env, logConfiguration } from './env.js';
import { SqliteEventStore } from './services/events/index.js';
import { VaderScorer } from './services/sentiment.js';
import { loadSyntheticProfile, seedEventStore } from './services/synthetic-data.js';
import { TriageEngine, loadCrisisKeywords } from './services/triage/index.js';
import { RNG } from './utils/rng.js';

const database = openDatabase(env.DATABASE_PATH);
const store = new SqliteEventStore(database.db);

// Configuration errors stop startup here, never at request time
const rng = new RNG();
const engine = new TriageEngine({
  scorer: new VaderScorer(),
  random: () => rng.uniform(),
  crisis: {
    keywords: await loadCrisisKeywords(env.CRISIS_KEYWORDS_PATH),
    sentimentThreshold: env.CRISIS_SENTIMENT_THRESHOLD,
  },
});

if (env.SEED_ON_EMPTY && (await store.count()) === 0) {
  const profile = await loadSyntheticProfile(env.SYNTHETIC_PROFILE_PATH);
  const summary = await seedEventStore(store, { count: env.SEED_RECORD_COUNT, profile, rng });
  console.log(`Seeded ${summary.generated} synthetic interactions (${summary.crisis} crisis)`);
}

const server = await buildServer({
  engine,
  store,
  corsOrigins: env.CORS_ORIGINS,
  analysis: {
    pendingPolicy: env.ANALYSIS_PENDING_POLICY,
    confidence: env.CONFIDENCE_LEVEL,
    liftHalfWidth: env.LIFT_CI_HALF_WIDTH,
  },
  logger: {
    level: env.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  },
});

// Graceful shutdown
async function shutdown() {
  await server.close();
  database.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown().catch((err) => {
      server.log.error(err);
      process.exit(1);
    });
  });
}

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`Triage Experiment API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  database.close();
  process.exit(1);
}
