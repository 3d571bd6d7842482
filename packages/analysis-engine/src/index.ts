export {
  checkInteractions,
  createAnalysisService,
  drugsFromSpans,
  recommendDosage,
  suggestAlternatives
} from "./analyzePrescription";
export type { AnalysisService, AnalysisServiceOptions } from "./analyzePrescription";
export {
  catalogVocabulary,
  defaultAlternatives,
  defaultDrugCatalog,
  normalizeDrugName
} from "./catalog";
export type { EntityExtractor } from "./extractor";
export { createLexiconExtractor } from "./lexiconExtractor";
