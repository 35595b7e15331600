/**
 * Record Normalizer
 *
 * Projects a raw registry study document into a canonical TrialRecord. This
 * is the only module that reads the raw tree.
 *
 * @module normalize/normalizer
 */

import { type JsonValue, type RawStudyDocument, isJsonObject } from '../../models/study.js';
import {
  INTERVENTION_TYPES,
  type ContactBundle,
  type InterventionType,
  type Modality,
  type TrialRecord,
} from '../../models/trial.js';
import { parsePartialDate } from './dates.js';
import {
  asString,
  getNested,
  readFlag,
  readInteger,
  readObjectList,
  readString,
  readStringList,
} from './nested.js';

const ID = 'protocolSection.identificationModule';
const STATUS = 'protocolSection.statusModule';
const DESIGN = 'protocolSection.designModule';
const SPONSOR = 'protocolSection.sponsorCollaboratorsModule';
const OVERSIGHT = 'protocolSection.oversightModule';
const CONTACTS = 'protocolSection.contactsLocationsModule';

/**
 * Modality buckets, evaluated first-match-wins in declared order
 */
const MODALITY_RULES: ReadonlyArray<{ modality: Modality; types: readonly InterventionType[] }> = [
  {
    modality: 'drug/biologic',
    types: ['DRUG', 'BIOLOGICAL', 'GENETIC', 'GENE_TRANSFER', 'CELL_THERAPY'],
  },
  { modality: 'device', types: ['DEVICE'] },
  { modality: 'procedure/surgery', types: ['PROCEDURE', 'SURGERY'] },
  { modality: 'radiation', types: ['RADIATION'] },
  { modality: 'diagnostic', types: ['DIAGNOSTIC_TEST'] },
  { modality: 'behavioral', types: ['BEHAVIORAL'] },
];

const KNOWN_INTERVENTION_TYPES: ReadonlySet<string> = new Set(INTERVENTION_TYPES);

function isInterventionType(token: string): token is InterventionType {
  return KNOWN_INTERVENTION_TYPES.has(token);
}

/**
 * Map intervention type tokens to an editorial modality bucket
 */
export function inferModality(interventionTypes: readonly string[]): Modality {
  const present = new Set<InterventionType>();
  for (const raw of interventionTypes) {
    const token = raw.toUpperCase();
    if (isInterventionType(token)) present.add(token);
  }
  for (const rule of MODALITY_RULES) {
    if (rule.types.some((t) => present.has(t))) return rule.modality;
  }
  return 'other';
}

function dedupe(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Intervention names and types as two deduplicated, order-preserving lists
 */
export function extractInterventions(study: RawStudyDocument): {
  names: string[];
  types: string[];
} {
  const names: string[] = [];
  const types: string[] = [];
  for (const item of readObjectList(study, 'protocolSection.armsInterventionsModule.interventions')) {
    const name = typeof item.name === 'string' ? item.name.trim() : '';
    const type = typeof item.type === 'string' ? item.type.trim() : '';
    if (name) names.push(name);
    if (type) types.push(type);
  }
  return { names: dedupe(names), types: dedupe(types) };
}

/**
 * Best-effort central contacts and overall officials
 */
export function extractContacts(study: RawStudyDocument): ContactBundle {
  const field = (obj: { [key: string]: JsonValue }, key: string): string | null =>
    asString(obj[key]);

  return {
    central_contacts: readObjectList(study, `${CONTACTS}.centralContacts`).map((c) => ({
      name: field(c, 'name'),
      role: field(c, 'role'),
      phone: field(c, 'phone'),
      email: field(c, 'email'),
    })),
    overall_officials: readObjectList(study, `${CONTACTS}.overallOfficials`).map((o) => ({
      name: field(o, 'name'),
      affiliation: field(o, 'affiliation'),
      role: field(o, 'role'),
    })),
  };
}

function structType(struct: JsonValue | undefined): string | null {
  return isJsonObject(struct) ? asString(struct.type) : null;
}

function isFilled(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '') {
    return false;
  }
  if (Array.isArray(value)) return value.length > 0;
  if (isJsonObject(value)) return Object.keys(value).length > 0;
  return true;
}

function countLocations(study: RawStudyDocument): number | null {
  const locations = [
    getNested(study, `${CONTACTS}.locations`),
    getNested(study, 'protocolSection.locationsModule.locations'),
  ].find(isFilled);
  if (locations === undefined) return 0;
  return Array.isArray(locations) ? locations.length : null;
}

function readIdentifier(study: RawStudyDocument): string | null {
  const nctId = readString(study, `${ID}.nctId`) || asString(study.id) || '';
  const trimmed = nctId.trim();
  return trimmed ? trimmed : null;
}

/**
 * Normalize one study document. Returns null when the document carries no
 * trial identifier; such records are dropped upstream.
 */
export function extractTrialRecord(study: RawStudyDocument): TrialRecord | null {
  const nctId = readIdentifier(study);
  if (nctId === null) return null;

  const { names, types } = extractInterventions(study);
  const primaryCompletionStruct = getNested(study, `${STATUS}.primaryCompletionDateStruct`);
  const completionStruct = getNested(study, `${STATUS}.completionDateStruct`);
  const resultsFirstPost = parsePartialDate(getNested(study, `${STATUS}.resultsFirstPostDateStruct`));

  const hasResultsFlag = study.hasResults;
  const hasResults =
    hasResultsFlag === undefined || hasResultsFlag === null
      ? resultsFirstPost.raw !== ''
      : Boolean(hasResultsFlag);

  return {
    nct_id: nctId,
    brief_title: readString(study, `${ID}.briefTitle`),
    official_title: readString(study, `${ID}.officialTitle`),
    acronym: readString(study, `${ID}.acronym`),
    overall_status: readString(study, `${STATUS}.overallStatus`),
    study_type: readString(study, `${DESIGN}.studyType`),
    phases: readStringList(study, `${DESIGN}.phases`),
    enrollment: readInteger(study, `${DESIGN}.enrollmentInfo.count`),
    enrollment_type: readString(study, `${DESIGN}.enrollmentInfo.type`),
    lead_sponsor_name:
      readString(study, `${SPONSOR}.leadSponsor.name`) ||
      readString(study, `${ID}.organization.fullName`),
    lead_sponsor_class:
      readString(study, `${SPONSOR}.leadSponsor.class`) ||
      readString(study, `${ID}.organization.class`),
    is_fda_regulated_drug: readFlag(study, `${OVERSIGHT}.isFdaRegulatedDrug`),
    is_fda_regulated_device: readFlag(study, `${OVERSIGHT}.isFdaRegulatedDevice`),
    oversight_has_dmc: readFlag(study, `${OVERSIGHT}.oversightHasDmc`),
    conditions: readStringList(study, 'protocolSection.conditionsModule.conditions'),
    interventions: names,
    intervention_types: types,
    modality: inferModality(types),
    location_count: countLocations(study),
    contacts: extractContacts(study),
    start_date: parsePartialDate(getNested(study, `${STATUS}.startDateStruct`)),
    primary_completion_date: parsePartialDate(primaryCompletionStruct),
    primary_completion_date_type: structType(primaryCompletionStruct),
    completion_date: parsePartialDate(completionStruct),
    completion_date_type: structType(completionStruct),
    last_update_post_date: parsePartialDate(getNested(study, `${STATUS}.lastUpdatePostDateStruct`)),
    results_first_post_date: resultsFirstPost,
    has_results: hasResults,
  };
}
