import {
  DRUG_ENTITY_GROUP,
  type AlternativeMap,
  type AnalysisResult,
  type DrugCatalog,
  type EntitySpan
} from "@rxverify/shared-types";
import {
  defaultAlternatives,
  defaultDrugCatalog,
  lookupAlternative,
  lookupDrug,
  normalizeDrugName
} from "./catalog";
import type { EntityExtractor } from "./extractor";

export interface AnalysisServiceOptions {
  extractor: EntityExtractor;
  catalog?: DrugCatalog;
  alternatives?: AlternativeMap;
}

export interface AnalysisService {
  readonly extractorName: string;
  extractDrugs(text: string): Promise<string[]>;
  analyze(text: string, age: number): Promise<AnalysisResult>;
}

/**
 * Canonical drug names from MISC spans, deduplicated in first-occurrence
 * order. That order is the pair enumeration order for interaction checks.
 */
export function drugsFromSpans(spans: readonly EntitySpan[]): string[] {
  const seen = new Set<string>();
  for (const span of spans) {
    if (span.entity_group !== DRUG_ENTITY_GROUP) {
      continue;
    }
    const name = normalizeDrugName(span.word);
    if (name) {
      seen.add(name);
    }
  }
  return [...seen];
}

/**
 * Flags a pair only when the earlier drug's record lists the later one.
 * The reverse listing is never consulted for the same pair.
 */
export function checkInteractions(
  drugs: readonly string[],
  catalog: DrugCatalog = defaultDrugCatalog
): string[] {
  const findings: string[] = [];

  for (let i = 0; i < drugs.length; i += 1) {
    const record = lookupDrug(catalog, drugs[i]);
    if (!record) {
      continue;
    }
    for (let j = i + 1; j < drugs.length; j += 1) {
      if (record.interactsWith.includes(drugs[j])) {
        findings.push(`${drugs[i]} interacts with ${drugs[j]}`);
      }
    }
  }

  return findings;
}

export function recommendDosage(
  drugs: readonly string[],
  age: number,
  catalog: DrugCatalog = defaultDrugCatalog
): Record<string, string> {
  const dosage: Record<string, string> = {};

  for (const drug of drugs) {
    const record = lookupDrug(catalog, drug);
    if (!record) {
      continue;
    }
    dosage[drug] = age >= record.minAge ? record.dosage : `Not recommended under age ${record.minAge}`;
  }

  return dosage;
}

export function suggestAlternatives(
  drugs: readonly string[],
  alternatives: AlternativeMap = defaultAlternatives
): Record<string, string> {
  const suggestions: Record<string, string> = {};

  for (const drug of drugs) {
    const alternative = lookupAlternative(alternatives, drug);
    if (alternative !== undefined) {
      suggestions[drug] = alternative;
    }
  }

  return suggestions;
}

export function createAnalysisService(options: AnalysisServiceOptions): AnalysisService {
  const { extractor } = options;
  const catalog = options.catalog ?? defaultDrugCatalog;
  const alternatives = options.alternatives ?? defaultAlternatives;

  const extractDrugs = async (text: string) => drugsFromSpans(await extractor.extract(text));

  return {
    extractorName: extractor.name,
    extractDrugs,
    async analyze(text, age) {
      const drugs = await extractDrugs(text);

      return {
        extracted_drugs: drugs,
        interactions: checkInteractions(drugs, catalog),
        dosage_info: recommendDosage(drugs, age, catalog),
        alternatives: suggestAlternatives(drugs, alternatives)
      };
    }
  };
}
