import type { AlternativeMap, DrugCatalog } from "@rxverify/shared-types";

export const defaultDrugCatalog: DrugCatalog = Object.freeze({
  ibuprofen: { interactsWith: ["aspirin"], minAge: 12, dosage: "200mg" },
  aspirin: { interactsWith: ["ibuprofen"], minAge: 16, dosage: "100mg" },
  paracetamol: { interactsWith: [], minAge: 1, dosage: "500mg" }
});

export const defaultAlternatives: AlternativeMap = Object.freeze({
  ibuprofen: "paracetamol",
  aspirin: "paracetamol"
});

export function normalizeDrugName(name: string): string {
  return name.trim().toLowerCase();
}

// Own keys only: a word like "constructor" must not resolve through the prototype.
export function lookupDrug(catalog: DrugCatalog, name: string) {
  return Object.prototype.hasOwnProperty.call(catalog, name) ? catalog[name] : undefined;
}

export function lookupAlternative(alternatives: AlternativeMap, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(alternatives, name) ? alternatives[name] : undefined;
}

/** Every name the tables know about, catalog keys first. */
export function catalogVocabulary(catalog: DrugCatalog, alternatives: AlternativeMap): string[] {
  const names = new Set<string>(Object.keys(catalog));
  for (const [drug, alternative] of Object.entries(alternatives)) {
    names.add(drug);
    names.add(alternative);
  }
  return [...names];
}
