/**
 * Closed vocabularies shared across the entry model.
 */

import { z } from "zod";

// ═══════════════════════════════════════════════════════════════════════════
// QUALITY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Review tier of an entry, ordered from least to most trusted.
 * "questionable" admits freshly migrated data that nobody has reviewed yet.
 */
export const QualityLevel = z.enum(["questionable", "low", "medium", "high"]);
export type QualityLevel = z.infer<typeof QualityLevel>;

/** Position of a quality level in the total order */
export function qualityRank(level: QualityLevel): number {
  return QualityLevel.options.indexOf(level);
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY STATE
// ═══════════════════════════════════════════════════════════════════════════

export const CompletenessLevel = z.enum(["unknown", "partial", "complete"]);
export type CompletenessLevel = z.infer<typeof CompletenessLevel>;

export const StatusLevel = z.enum(["pending", "embargoed", "active", "retired"]);
export type StatusLevel = z.infer<typeof StatusLevel>;
