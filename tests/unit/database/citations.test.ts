/**
 * Citation storage tests
 *
 * Uses REAL better-sqlite3 databases. NO MOCKS.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { createTestDir, cleanupTestDir, openTestService, type DatabaseService } from './helpers.js';
import type { Citation } from '../../../src/models/citation.js';

function citation(pmid: string, title: string | null = `Paper ${pmid}`): Citation {
  return { pmid, title, source: 'Journal', pub_date: '2024', doi: null };
}

describe('DatabaseService - Citations', () => {
  let testDir: string;
  let db: DatabaseService;

  beforeAll(() => {
    testDir = createTestDir('db-citations');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    db = openTestService(testDir);
  });

  afterEach(() => {
    db.close();
  });

  it('stores citations keyed on trial and pmid', () => {
    expect(db.upsertCitations('NCT1', [citation('99'), citation('100')])).toBe(2);

    const rows = db.getCitations('NCT1');
    expect(rows.map((r) => r.pmid)).toEqual(['100', '99']);
    expect(rows[1]).toMatchObject({
      nct_id: 'NCT1',
      pmid: '99',
      title: 'Paper 99',
      source: 'Journal',
      pub_date: '2024',
      doi: null,
    });
    expect(rows[1].last_seen_utc).toMatch(/\+00:00$/);
  });

  it('is idempotent and refreshes metadata', () => {
    db.upsertCitations('NCT1', [citation('1', 'Draft')]);
    db.upsertCitations('NCT1', [citation('1', 'Final')]);

    expect(db.countCitations('NCT1')).toBe(1);
    expect(db.getCitations('NCT1')[0].title).toBe('Final');
  });

  it('keeps the same pmid separate per trial', () => {
    db.upsertCitations('NCT1', [citation('5')]);
    db.upsertCitations('NCT2', [citation('5')]);

    expect(db.countCitations()).toBe(2);
    expect(db.countCitations('NCT2')).toBe(1);
  });

  it('skips entries without a pmid', () => {
    expect(db.upsertCitations('NCT1', [citation('  '), citation('7')])).toBe(1);
    expect(db.getCitations('NCT1').map((r) => r.pmid)).toEqual(['7']);
  });

  it('returns nothing for an unknown trial', () => {
    expect(db.getCitations('NCT404')).toEqual([]);
    expect(db.countCitations('NCT404')).toBe(0);
  });
});
