import { describe, it, expect } from 'vitest';
import { RNG } from '../../../utils/rng.js';
import { assertResponseCatalog, createTreatmentAssigner, MIN_RESPONSE_LENGTH, selectResponse } from '../rules.js';
import { DEFAULT_RESPONSES } from '../responses.js';
import { SEVERITIES, TREATMENTS } from '../types.js';
import type { ResponseCatalog, Treatment } from '../types.js';

describe('Triage Rules', () => {
  describe('createTreatmentAssigner', () => {
    it('should split at one half', () => {
      expect(createTreatmentAssigner(() => 0)()).toBe('A_CLINICAL');
      expect(createTreatmentAssigner(() => 0.4999)()).toBe('A_CLINICAL');
      expect(createTreatmentAssigner(() => 0.5)()).toBe('B_EMPATHETIC');
      expect(createTreatmentAssigner(() => 0.99)()).toBe('B_EMPATHETIC');
    });

    it('should draw independently on every call', () => {
      const draws = [0.1, 0.9, 0.2, 0.8];
      let i = 0;
      const assign = createTreatmentAssigner(() => draws[i++]);

      expect([assign(), assign(), assign(), assign()]).toEqual([
        'A_CLINICAL',
        'B_EMPATHETIC',
        'A_CLINICAL',
        'B_EMPATHETIC',
      ]);
    });

    it('should produce a roughly even split with the default source', () => {
      const assign = createTreatmentAssigner();
      const draws: Treatment[] = Array.from({ length: 1000 }, () => assign());

      expect(draws.every(t => TREATMENTS.includes(t))).toBe(true);
      const fractionA = draws.filter(t => t === 'A_CLINICAL').length / draws.length;
      expect(fractionA).toBeGreaterThanOrEqual(0.4);
      expect(fractionA).toBeLessThanOrEqual(0.6);
    });

    it('should produce a roughly even split with a seeded source', () => {
      const rng = new RNG(42);
      const assign = createTreatmentAssigner(() => rng.uniform());
      const countA = Array.from({ length: 1000 }, () => assign()).filter(t => t === 'A_CLINICAL').length;

      expect(countA).toBeGreaterThanOrEqual(400);
      expect(countA).toBeLessThanOrEqual(600);
    });
  });

  describe('selectResponse', () => {
    it('should populate every treatment and severity', () => {
      for (const treatment of TREATMENTS) {
        for (const severity of SEVERITIES) {
          const response = selectResponse(DEFAULT_RESPONSES, treatment, severity);
          expect(response.length).toBeGreaterThan(MIN_RESPONSE_LENGTH);
        }
      }
    });

    it('should differ between treatments for the same severity', () => {
      for (const severity of SEVERITIES) {
        expect(selectResponse(DEFAULT_RESPONSES, 'A_CLINICAL', severity)).not.toBe(
          selectResponse(DEFAULT_RESPONSES, 'B_EMPATHETIC', severity)
        );
      }
    });
  });

  describe('assertResponseCatalog', () => {
    it('should accept the default catalog', () => {
      expect(() => assertResponseCatalog(DEFAULT_RESPONSES)).not.toThrow();
    });

    it('should reject a degenerate entry', () => {
      const catalog: ResponseCatalog = {
        ...DEFAULT_RESPONSES,
        B_EMPATHETIC: { ...DEFAULT_RESPONSES.B_EMPATHETIC, severe: 'Too short.' },
      };

      expect(() => assertResponseCatalog(catalog)).toThrow('Response catalog is incomplete');
    });

    it('should reject a catalog loaded with a missing entry', () => {
      const { severe: _dropped, ...partial } = DEFAULT_RESPONSES.A_CLINICAL;
      const catalog: ResponseCatalog = JSON.parse(
        JSON.stringify({ ...DEFAULT_RESPONSES, A_CLINICAL: partial })
      );

      try {
        assertResponseCatalog(catalog);
        expect.unreachable();
      } catch (err) {
        expect(err).toHaveProperty('code', 'configuration_error');
        expect(err).toHaveProperty('details', { problems: ['A_CLINICAL/severe: missing'] });
      }
    });
  });
});
