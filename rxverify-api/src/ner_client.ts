import type { EntityExtractor } from "@rxverify/analysis-engine";
import type { EntitySpan } from "@rxverify/shared-types";
import fetch from "node-fetch";

type JsonRecord = Record<string, unknown>;

export interface HostedNerOptions {
  apiUrl: string;
  model: string;
  apiToken?: string;
}

export class EntityExtractionError extends Error {
  public readonly status?: number;

  public constructor(message: string, status?: number) {
    super(message);
    this.name = "EntityExtractionError";
    this.status = status;
  }
}

function asRecord(value: unknown): JsonRecord | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return value as JsonRecord;
}

function readString(record: JsonRecord, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) {
      return value;
    }
  }
  return undefined;
}

function readNumber(record: JsonRecord, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
  }
  return undefined;
}

// Ungrouped token output carries "entity" with an IOB prefix, e.g. "B-MISC".
function readEntityGroup(record: JsonRecord): string | undefined {
  const grouped = readString(record, ["entity_group"]);
  if (grouped) return grouped;
  const entity = readString(record, ["entity"]);
  return entity?.replace(/^[BI]-/, "");
}

function parseSpan(value: unknown): EntitySpan | null {
  const record = asRecord(value);
  if (!record) return null;

  const word = readString(record, ["word"]);
  const entityGroup = readEntityGroup(record);
  if (!word || !entityGroup) return null;

  return {
    word,
    entity_group: entityGroup,
    score: readNumber(record, ["score"]),
    start: readNumber(record, ["start"]),
    end: readNumber(record, ["end"]),
  };
}

/**
 * Accepts the token-classification payload as a flat list of spans, or the
 * batched form with one nested list per input.
 */
export function parseEntityResponse(response: unknown): EntitySpan[] {
  const root = asRecord(response);
  if (root) {
    const message = readString(root, ["error", "message"]);
    throw new EntityExtractionError(
      message ?? "Unexpected entity extractor response",
    );
  }

  if (!Array.isArray(response)) {
    throw new EntityExtractionError("Unexpected entity extractor response");
  }

  const items: unknown[] =
    response.length > 0 && response.every(Array.isArray)
      ? response.flat()
      : response;

  const spans: EntitySpan[] = [];
  for (const item of items) {
    const span = parseSpan(item);
    if (span) spans.push(span);
  }
  return spans;
}

export function buildModelUrl(apiUrl: string, model: string): string {
  return `${apiUrl.replace(/\/+$/, "")}/${model.replace(/^\/+/, "")}`;
}

export function createHostedNerExtractor(
  options: HostedNerOptions,
): EntityExtractor {
  const url = buildModelUrl(options.apiUrl, options.model);

  return {
    name: `hosted:${options.model}`,
    async extract(text: string): Promise<EntitySpan[]> {
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
      };
      if (options.apiToken) {
        headers.Authorization = `Bearer ${options.apiToken}`;
      }

      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify({
          inputs: text,
          parameters: { aggregation_strategy: "simple" },
        }),
      });
      if (!response.ok) {
        throw new EntityExtractionError(
          `Entity extractor failed with ${response.status}`,
          response.status,
        );
      }

      const rawText = await response.text();
      let data: unknown;
      try {
        data = JSON.parse(rawText);
      } catch {
        throw new EntityExtractionError(
          "Entity extractor returned malformed JSON",
          response.status,
        );
      }

      return parseEntityResponse(data);
    },
  };
}
