/**
 * Trial interfaces for the registry sync pipeline
 *
 * A TrialRecord is the canonical, flattened projection of one registry study
 * document. It is created fresh on every sync pass and folded into a
 * persisted trial row.
 */

/**
 * Granularity at which a registry date was specified
 */
export type DatePrecision = 'DAY' | 'MONTH' | 'YEAR' | 'NONE';

/**
 * A registry date resolved to a comparable calendar date
 */
export interface ParsedDate {
  /** Source string (trimmed), kept for display even when parsing fails */
  raw: string;

  /** ISO calendar date (YYYY-MM-DD) used for ordering, or null */
  value: string | null;

  precision: DatePrecision;
}

/**
 * Phase tokens in precedence order, most advanced first
 */
export const PHASE_PRECEDENCE = ['PHASE4', 'PHASE3', 'PHASE2', 'PHASE1', 'EARLY_PHASE1'] as const;

export type PhaseToken = (typeof PHASE_PRECEDENCE)[number];

/**
 * Editorial modality buckets derived from intervention type tokens
 */
export const MODALITIES = [
  'drug/biologic',
  'device',
  'procedure/surgery',
  'radiation',
  'diagnostic',
  'behavioral',
  'other',
] as const;

export type Modality = (typeof MODALITIES)[number];

/**
 * Intervention type tokens the modality table recognises
 */
export const INTERVENTION_TYPES = [
  'DRUG',
  'BIOLOGICAL',
  'GENETIC',
  'GENE_TRANSFER',
  'CELL_THERAPY',
  'DEVICE',
  'PROCEDURE',
  'SURGERY',
  'RADIATION',
  'DIAGNOSTIC_TEST',
  'BEHAVIORAL',
] as const;

export type InterventionType = (typeof INTERVENTION_TYPES)[number];

export interface CentralContact {
  name: string | null;
  role: string | null;
  phone: string | null;
  email: string | null;
}

export interface OverallOfficial {
  name: string | null;
  affiliation: string | null;
  role: string | null;
}

export interface ContactBundle {
  central_contacts: CentralContact[];
  overall_officials: OverallOfficial[];
}

/**
 * Canonical trial record produced by the normalizer
 */
export interface TrialRecord {
  /** Registry trial identifier (e.g. NCT01234567) */
  nct_id: string;

  brief_title: string;
  official_title: string;
  acronym: string;

  overall_status: string;
  study_type: string;
  phases: string[];

  enrollment: number | null;
  enrollment_type: string;

  /** Lead sponsor, falling back to the organisation identity */
  lead_sponsor_name: string;
  lead_sponsor_class: string;

  is_fda_regulated_drug: boolean | null;
  is_fda_regulated_device: boolean | null;
  oversight_has_dmc: boolean | null;

  conditions: string[];
  interventions: string[];
  intervention_types: string[];
  modality: Modality;

  /** null when the source carries no location list */
  location_count: number | null;
  contacts: ContactBundle;

  start_date: ParsedDate;
  primary_completion_date: ParsedDate;
  /** ACTUAL / ESTIMATED as reported by the registry */
  primary_completion_date_type: string | null;
  completion_date: ParsedDate;
  completion_date_type: string | null;
  last_update_post_date: ParsedDate;
  results_first_post_date: ParsedDate;

  has_results: boolean;
}
