// Environment configuration for the triage experiment API
// Load server, storage, triage and analysis settings from environment variables

import path from 'path';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

export type PendingPolicy = 'count_as_non_conversion' | 'exclude';

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseNumberInRange(
  value: string | undefined,
  defaultValue: number,
  name: string,
  min: number,
  max: number,
): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export function parsePendingPolicy(value: string | undefined, fallback: PendingPolicy): PendingPolicy {
  const trimmed = strEnv(value);
  if (!trimmed) return fallback;
  if (trimmed === 'count_as_non_conversion' || trimmed === 'exclude') return trimmed;
  console.error(`Invalid ANALYSIS_PENDING_POLICY "${value}", using default ${fallback}`);
  return fallback;
}

const resolveFromCwd = (value: string) => path.resolve(process.cwd(), value);

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Storage
  DATABASE_PATH: strEnv(process.env.DATABASE_PATH, './data/experiment.db'),

  // Triage
  CRISIS_KEYWORDS_PATH: resolveFromCwd(strEnv(process.env.CRISIS_KEYWORDS_PATH, 'config/crisis-keywords.json')),
  CRISIS_SENTIMENT_THRESHOLD: parseNumberInRange(
    process.env.CRISIS_SENTIMENT_THRESHOLD,
    -0.8,
    'CRISIS_SENTIMENT_THRESHOLD',
    -1,
    1,
  ),

  // Analysis
  ANALYSIS_PENDING_POLICY: parsePendingPolicy(process.env.ANALYSIS_PENDING_POLICY, 'count_as_non_conversion'),
  CONFIDENCE_LEVEL: parseNumberInRange(process.env.CONFIDENCE_LEVEL, 0.95, 'CONFIDENCE_LEVEL', 0.5, 0.999),
  LIFT_CI_HALF_WIDTH: parseNumberInRange(process.env.LIFT_CI_HALF_WIDTH, 0.15, 'LIFT_CI_HALF_WIDTH', 0, 10),

  // Synthetic data
  SYNTHETIC_PROFILE_PATH: resolveFromCwd(strEnv(process.env.SYNTHETIC_PROFILE_PATH, 'config/synthetic-profile.json')),
  SEED_ON_EMPTY: process.env.SEED_ON_EMPTY === 'true',
  SEED_RECORD_COUNT: parsePositiveInt(process.env.SEED_RECORD_COUNT, 500, 'SEED_RECORD_COUNT'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

// Log configuration on startup
export function logConfiguration() {
  console.log('Triage Experiment API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Database: ${env.DATABASE_PATH}`);
  console.log(`  Crisis keywords: ${env.CRISIS_KEYWORDS_PATH}`);
  console.log(`  Crisis sentiment threshold: ${env.CRISIS_SENTIMENT_THRESHOLD}`);
  console.log(`  Pending outcomes: ${env.ANALYSIS_PENDING_POLICY}`);
  console.log(`  Confidence level: ${env.CONFIDENCE_LEVEL}`);
  console.log(`  Lift band half-width: ${env.LIFT_CI_HALF_WIDTH}`);
  console.log(`  Seed on empty: ${env.SEED_ON_EMPTY}`);
  if (env.SEED_ON_EMPTY) {
    console.log(`  Seed record count: ${env.SEED_RECORD_COUNT}`);
  }
}
