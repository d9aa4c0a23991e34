import type { ExtractedFields, FieldValue, ValidationRules } from "./types";

export type ValidationResult = {
  ok: boolean;
  errors: string[];
  warnings: string[];
};

/** Absent, null, blank strings, and empty arrays or objects count as missing. */
export function isBlank(value: FieldValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return false;
}

function matchesType(value: FieldValue, expected: string): boolean {
  switch (expected.toLowerCase()) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    default:
      // date, object and friends are descriptive only
      return true;
  }
}

function matchesPattern(value: FieldValue, pattern: string): boolean | null {
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${pattern})`);
  } catch {
    return null;
  }
  const text = typeof value === "string" ? value : JSON.stringify(value);
  return regex.test(text);
}

/**
 * Check extracted fields against a mapping's rules.
 *
 * Required and type violations are errors. Pattern mismatches are warnings
 * and never block a sync.
 */
export function validateFields(fields: ExtractedFields, rules: ValidationRules): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [field, rule] of Object.entries(rules)) {
    const value = Object.hasOwn(fields, field) ? fields[field] : undefined;

    if (rule.required === true && isBlank(value)) {
      errors.push(`Required field '${field}' is missing`);
      continue;
    }

    if (value === undefined || value === null) continue;

    if (rule.type && !matchesType(value, rule.type)) {
      errors.push(`Field '${field}' has invalid type. Expected ${rule.type}`);
    }

    if (rule.pattern) {
      const matched = matchesPattern(value, rule.pattern);
      if (matched === null) {
        warnings.push(`Field '${field}' has an invalid pattern: ${rule.pattern}`);
      } else if (!matched) {
        warnings.push(`Field '${field}' doesn't match expected pattern`);
      }
    }
  }

  return { ok: errors.length === 0, errors, warnings };
}

/** Rename extracted fields to destination names. Keys without a mapping are dropped. */
export function mapFields(
  extracted: ExtractedFields,
  mappingTable: Record<string, string>,
): ExtractedFields {
  const mapped: ExtractedFields = {};
  for (const [source, value] of Object.entries(extracted)) {
    if (!Object.hasOwn(mappingTable, source)) continue;
    const destination = mappingTable[source];
    if (destination === undefined) continue;
    mapped[destination] = value;
  }
  return mapped;
}
