/**
 * Citation operations for DatabaseService
 *
 * @module database/citation-operations
 */

import type Database from 'better-sqlite3';
import type { Citation, CitationRow } from '../../../models/citation.js';
import { utcNowIso } from '../../../utils/time.js';

/**
 * Insert or refresh citations keyed on (nct_id, pmid). Entries with an empty
 * pmid are skipped.
 *
 * @returns Number of citations written
 */
export function upsertCitations(
  db: Database.Database,
  nctId: string,
  citations: readonly Citation[],
  seenAt: string = utcNowIso()
): number {
  const stmt = db.prepare(
    `INSERT INTO pubmed_citations (nct_id, pmid, title, source, pub_date, doi, last_seen_utc)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(nct_id, pmid) DO UPDATE SET
       title = excluded.title,
       source = excluded.source,
       pub_date = excluded.pub_date,
       doi = excluded.doi,
       last_seen_utc = excluded.last_seen_utc`
  );

  const insertAll = db.transaction((): number => {
    let written = 0;
    for (const citation of citations) {
      const pmid = citation.pmid.trim();
      if (!pmid) continue;
      stmt.run(nctId, pmid, citation.title, citation.source, citation.pub_date, citation.doi, seenAt);
      written++;
    }
    return written;
  });

  return insertAll();
}

/**
 * Stored citations for a trial, ordered by pmid
 */
export function getCitations(db: Database.Database, nctId: string): CitationRow[] {
  return db
    .prepare(
      `SELECT nct_id, pmid, title, source, pub_date, doi, last_seen_utc
       FROM pubmed_citations WHERE nct_id = ? ORDER BY pmid`
    )
    .all(nctId) as CitationRow[];
}

export function countCitations(db: Database.Database, nctId?: string): number {
  const row = (
    nctId === undefined
      ? db.prepare('SELECT COUNT(*) AS count FROM pubmed_citations').get()
      : db.prepare('SELECT COUNT(*) AS count FROM pubmed_citations WHERE nct_id = ?').get(nctId)
  ) as { count: number };
  return row.count;
}
