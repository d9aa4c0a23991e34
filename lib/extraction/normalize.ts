import { isConfidenceLevel } from "../recordings/confidence";
import { toExtractedFields } from "../recordings/fieldValue";
import type { ExtractionResult } from "../recordings/types";

export const UNKNOWN_ENTITY = "unknown";

/**
 * Turn a model reply into an ExtractionResult. An absent, blank or "unknown"
 * entity type is the unknown branch; an unrecognised confidence is LOW.
 */
export function normalizeExtraction(raw: unknown): ExtractionResult {
  const record: Record<string, unknown> =
    raw && typeof raw === "object" ? Object.fromEntries(Object.entries(raw)) : {};

  const confidenceRaw =
    typeof record.confidence === "string" ? record.confidence.trim().toUpperCase() : undefined;
  const confidence = isConfidenceLevel(confidenceRaw) ? confidenceRaw : "LOW";
  const fields = toExtractedFields(record.extracted_data);
  const notes = typeof record.notes === "string" && record.notes.trim() ? record.notes.trim() : null;

  const entityType = typeof record.entity_type === "string" ? record.entity_type.trim() : "";
  if (!entityType || entityType.toLowerCase() === UNKNOWN_ENTITY) {
    return { kind: "unknown", confidence, fields, notes };
  }

  return { kind: "classified", entityType, confidence, fields, notes };
}
