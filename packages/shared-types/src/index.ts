/** Label the extractor assigns to spans treated as drug-name candidates. */
export const DRUG_ENTITY_GROUP = "MISC";

export interface EntitySpan {
  word: string;
  entity_group: string;
  score?: number;
  start?: number;
  end?: number;
}

export interface DrugRecord {
  interactsWith: string[];
  /** Youngest age, in whole years, the dosage applies to. */
  minAge: number;
  dosage: string;
}

/** Keyed by canonical (lowercase) drug name. */
export type DrugCatalog = Readonly<Record<string, DrugRecord>>;

export type AlternativeMap = Readonly<Record<string, string>>;

export interface PrescriptionRequest {
  text: string;
  age: number;
}

export interface AnalysisResult {
  extracted_drugs: string[];
  interactions: string[];
  dosage_info: Record<string, string>;
  alternatives: Record<string, string>;
}

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
}
