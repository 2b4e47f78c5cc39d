import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type DatabaseHandle } from '../../../db.js';
import { newRecord } from '../../../test-utils/records.js';
import { SqliteEventStore } from '../sqlite-store.js';

describe('SqliteEventStore', () => {
  let handle: DatabaseHandle;
  let store: SqliteEventStore;

  beforeEach(() => {
    handle = openDatabase(':memory:');
    store = new SqliteEventStore(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  describe('append', () => {
    it('should store a record and read it back', async () => {
      const input = newRecord({ sessionId: 'abc', severity: 'mild', referralSource: 'email_campaign' });

      const id = await store.append(input);
      const [stored] = await store.queryAll();

      expect(id).toBe(1);
      expect(stored).toEqual({ ...input, id: 1, sessionDepth: 1 });
    });

    it('should reject a duplicate session', async () => {
      await store.append(newRecord({ sessionId: 'dup' }));

      await expect(store.append(newRecord({ sessionId: 'dup' }))).rejects.toHaveProperty('code', 'conflict');
      expect(await store.count()).toBe(1);
    });

    it('should reject a crisis record that carries a treatment', async () => {
      const invalid = newRecord({ exclusionReason: 'crisis_protocol', assignedTreatment: 'B_EMPATHETIC' });

      await expect(store.append(invalid)).rejects.toHaveProperty('code', 'validation_error');
    });

    it('should reject an unassigned record outside the crisis protocol', async () => {
      const invalid = newRecord({ assignedTreatment: null, exclusionReason: null });

      await expect(store.append(invalid)).rejects.toHaveProperty('code', 'validation_error');
    });
  });

  describe('appendMany', () => {
    it('should insert every record across chunks', async () => {
      const records = Array.from({ length: 1203 }, () => newRecord());

      expect(await store.appendMany(records)).toBe(1203);
      expect(await store.count()).toBe(1203);
    });

    it('should insert nothing when one record breaks the exclusion rule', async () => {
      const records = [newRecord(), newRecord({ assignedTreatment: null })];

      await expect(store.appendMany(records)).rejects.toHaveProperty('code', 'validation_error');
      expect(await store.count()).toBe(0);
    });

    it('should accept an empty batch', async () => {
      expect(await store.appendMany([])).toBe(0);
    });
  });

  describe('updateOutcome', () => {
    it('should record the outcome once', async () => {
      await store.append(newRecord({ sessionId: 'open', converted: null }));

      await store.updateOutcome('open', true, 4200);
      const [stored] = await store.queryAll();

      expect(stored.converted).toBe(true);
      expect(stored.decisionLatencyMs).toBe(4200);
      await expect(store.updateOutcome('open', false, 100)).rejects.toHaveProperty('code', 'conflict');
    });

    it('should reject an unknown session', async () => {
      await expect(store.updateOutcome('missing', true, 10)).rejects.toHaveProperty('code', 'not_found');
    });

    it('should reject an excluded session', async () => {
      await store.append(
        newRecord({ sessionId: 'crisis', assignedTreatment: null, converted: null, exclusionReason: 'crisis_protocol' })
      );

      await expect(store.updateOutcome('crisis', true, 10)).rejects.toHaveProperty('code', 'conflict');
    });
  });

  describe('queryAll', () => {
    it('should order records by timestamp', async () => {
      await store.append(newRecord({ sessionId: 'late', timestamp: '2026-01-02T00:00:00.000Z' }));
      await store.append(newRecord({ sessionId: 'early', timestamp: '2026-01-01T00:00:00.000Z' }));

      const records = await store.queryAll();

      expect(records.map(record => record.sessionId)).toEqual(['early', 'late']);
    });
  });

  it('should clear every record', async () => {
    await store.appendMany([newRecord(), newRecord()]);

    await store.clear();

    expect(await store.count()).toBe(0);
  });
});
