/**
 * Literature citation interfaces
 */

/**
 * Citation resolved from the bibliographic summary endpoint
 */
export interface Citation {
  /** PubMed identifier */
  pmid: string;
  title: string | null;
  /** Journal name, falling back to the abbreviated source */
  source: string | null;
  /** Free-form publication date; not guaranteed to be sortable */
  pub_date: string | null;
  doi: string | null;
}

/**
 * Stored citation, keyed on (nct_id, pmid)
 */
export interface CitationRow extends Citation {
  nct_id: string;
  last_seen_utc: string | null;
}
