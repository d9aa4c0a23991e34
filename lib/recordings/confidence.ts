import type { ConfidenceLevel } from "./types";

/** Numeric provider confidence (0..1) to a level. No score means HIGH. */
export function toConfidenceLevel(score: number | undefined | null): ConfidenceLevel {
  if (score === undefined || score === null || !Number.isFinite(score)) return "HIGH";
  if (score >= 0.85) return "HIGH";
  if (score >= 0.6) return "MEDIUM";
  return "LOW";
}

export function isConfidenceLevel(value: unknown): value is ConfidenceLevel {
  return value === "HIGH" || value === "MEDIUM" || value === "LOW";
}
