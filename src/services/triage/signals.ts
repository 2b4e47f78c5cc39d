// Stage A: Signal Detection
// Severity bucket and crisis override, both derived from the text and its sentiment score

import fs from 'fs/promises';
import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import type { CrisisConfig, CrisisTrigger, Severity } from './types.js';

const SEVERE_BELOW = -0.5;
const MODERATE_BELOW = 0;

export function classifySeverity(score: number): Severity {
  if (score < SEVERE_BELOW) return 'severe';
  if (score < MODERATE_BELOW) return 'moderate';
  return 'mild';
}

export function isBelowCrisisThreshold(score: number, threshold: number): boolean {
  return score < threshold;
}

// Plain substring containment on the lower-cased text, not tokenized
export function findCrisisKeyword(text: string, keywords: readonly string[]): string | null {
  const haystack = text.toLowerCase();
  for (const keyword of keywords) {
    if (haystack.includes(keyword)) {
      return keyword;
    }
  }
  return null;
}

export function detectCrisisTrigger(text: string, score: number, config: CrisisConfig): CrisisTrigger | null {
  if (isBelowCrisisThreshold(score, config.sentimentThreshold)) {
    return { kind: 'sentiment', score, threshold: config.sentimentThreshold };
  }

  const keyword = findCrisisKeyword(text, config.keywords);
  if (keyword !== null) {
    return { kind: 'keyword', keyword };
  }

  return null;
}

export function detectCrisis(text: string, score: number, config: CrisisConfig): boolean {
  return detectCrisisTrigger(text, score, config) !== null;
}

// Trimmed, lower-cased and deduplicated; blank entries would match any text
export function normalizeCrisisKeywords(keywords: readonly string[]): string[] {
  const normalized = keywords.map(keyword => keyword.trim().toLowerCase()).filter(keyword => keyword.length > 0);
  return Array.from(new Set(normalized));
}

const CrisisKeywordFileSchema = z.object({
  keywords: z.array(z.string().trim().min(1)).min(1),
});

export function parseCrisisKeywords(raw: unknown): string[] {
  const parsed = CrisisKeywordFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.configuration('Invalid crisis keyword configuration', parsed.error.flatten());
  }
  return normalizeCrisisKeywords(parsed.data.keywords);
}

export async function loadCrisisKeywords(filePath: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw AppError.configuration(`Cannot read crisis keyword file ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (err) {
    throw AppError.configuration(`Crisis keyword file ${filePath} is not valid JSON`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  return parseCrisisKeywords(raw);
}
