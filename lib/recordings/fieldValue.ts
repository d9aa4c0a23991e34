import type { ExtractedFields, FieldValue } from "./types";

/** Narrow parsed JSON to a FieldValue; drops anything JSON cannot carry. */
export function toFieldValue(value: unknown): FieldValue | undefined {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const out: FieldValue[] = [];
    for (const item of value) {
      const mapped = toFieldValue(item);
      if (mapped !== undefined) out.push(mapped);
    }
    return out;
  }
  if (typeof value === "object") {
    const out: { [key: string]: FieldValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const mapped = toFieldValue(item);
      if (mapped !== undefined) out[key] = mapped;
    }
    return out;
  }
  return undefined;
}

/** Plain-object input to ExtractedFields; anything else is an empty record. */
export function toExtractedFields(value: unknown): ExtractedFields {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  const normalized = toFieldValue(value);
  return normalized && typeof normalized === "object" && !Array.isArray(normalized)
    ? normalized
    : {};
}

export function serializeFields(fields: ExtractedFields | null): string | null {
  return fields === null ? null : JSON.stringify(fields);
}

export function parseFields(json: string | null): ExtractedFields | null {
  if (json === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  return toExtractedFields(parsed);
}
