// Stage B: Rules
// Treatment assignment and response lookup for participants outside the crisis path

import { AppError } from '../../utils/errors.js';
import { SEVERITIES, TREATMENTS } from './types.js';
import type { RandomSource, ResponseCatalog, Severity, Treatment } from './types.js';

export const MIN_RESPONSE_LENGTH = 50;

// Fixed, non-adaptive 50/50 split. Each call is an independent draw.
export function createTreatmentAssigner(random: RandomSource = Math.random): () => Treatment {
  return () => (random() < 0.5 ? 'A_CLINICAL' : 'B_EMPATHETIC');
}

export function selectResponse(catalog: ResponseCatalog, treatment: Treatment, severity: Severity): string {
  return catalog[treatment][severity];
}

/**
 * Fails startup when a treatment × severity entry is missing or degenerate.
 * The catalog type already rules out missing keys for literal tables; this
 * covers catalogs assembled at run time.
 */
export function assertResponseCatalog(catalog: ResponseCatalog): void {
  const problems: string[] = [];

  for (const treatment of TREATMENTS) {
    const byTreatment: Partial<Record<Severity, string>> | undefined = catalog[treatment];
    for (const severity of SEVERITIES) {
      const text = byTreatment?.[severity];
      if (typeof text !== 'string') {
        problems.push(`${treatment}/${severity}: missing`);
      } else if (text.trim().length < MIN_RESPONSE_LENGTH) {
        problems.push(`${treatment}/${severity}: shorter than ${MIN_RESPONSE_LENGTH} characters`);
      }
    }
  }

  if (problems.length > 0) {
    throw AppError.configuration('Response catalog is incomplete', { problems });
  }
}
