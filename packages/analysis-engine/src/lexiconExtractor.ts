import { DRUG_ENTITY_GROUP, type EntitySpan } from "@rxverify/shared-types";
import type { EntityExtractor } from "./extractor";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildPattern(vocabulary: readonly string[]): RegExp | null {
  const terms = [...new Set(vocabulary.map((term) => term.trim()).filter(Boolean))]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  if (terms.length === 0) {
    return null;
  }
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${terms.join("|")})(?![\\p{L}\\p{N}])`, "giu");
}

/**
 * Offline extractor that labels whole-word, case-insensitive occurrences of a
 * fixed vocabulary as MISC spans, in text order. Spans keep the surface text
 * so normalization stays the analyzer's job.
 */
export function createLexiconExtractor(vocabulary: readonly string[]): EntityExtractor {
  const pattern = buildPattern(vocabulary);

  return {
    name: "lexicon",
    async extract(text: string): Promise<EntitySpan[]> {
      if (!pattern) {
        return [];
      }
      const spans: EntitySpan[] = [];
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        spans.push({
          word: match[0],
          entity_group: DRUG_ENTITY_GROUP,
          score: 1,
          start,
          end: start + match[0].length
        });
      }
      return spans;
    }
  };
}
