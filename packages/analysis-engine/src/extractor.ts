import type { EntitySpan } from "@rxverify/shared-types";

/** Any named-entity capability mapping raw text to labeled spans. */
export interface EntityExtractor {
  readonly name: string;
  extract(text: string): Promise<EntitySpan[]>;
}
