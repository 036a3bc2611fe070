/**
 * Legacy evidence lists.
 *
 * Legacy documents list evidence as bare method names. Predictions are no
 * longer evidence, so they are dropped wherever a list is carried over.
 */

import type { Citation } from "../common/citation.js";
import { PREDICTION_METHOD, type Evidence } from "../common/evidence.js";

/**
 * Methods of a legacy evidence list, without sequence-based predictions.
 */
export function withoutPredictions(methods: readonly string[] | undefined): string[] {
  return (methods ?? []).filter((method) => method !== PREDICTION_METHOD);
}

/**
 * Evidence items for the non-prediction methods of a legacy list.
 */
export function convertEvidence(
  methods: readonly string[] | undefined,
  references: readonly Citation[] = []
): Evidence[] {
  return withoutPredictions(methods).map((method) => ({ method, references: [...references] }));
}
