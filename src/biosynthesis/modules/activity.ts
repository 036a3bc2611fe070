/**
 * Non-canonical module behaviour: skipped, non-elongating or iterated.
 */

import { z } from "zod";
import { EvidenceWire, NcaEvidence } from "../../common/evidence.js";
import { compact, entity, Issues } from "../../common/validation.js";

/** Wire value of "iterated an unknown number of times" */
export const UNSPECIFIED_ITERATIONS = -1;

/**
 * How often a module runs beyond its canonical single pass.
 */
export type Iterations =
  | { readonly kind: "none" }
  | { readonly kind: "count"; readonly count: number }
  | { readonly kind: "unspecified" };

export const NO_ITERATIONS: Iterations = { kind: "none" };
export const UNKNOWN_ITERATIONS: Iterations = { kind: "unspecified" };

export function iterationCount(count: number): Iterations {
  return { kind: "count", count };
}

function readIterations(raw: number | undefined): Iterations {
  if (raw === undefined) return NO_ITERATIONS;
  if (raw === UNSPECIFIED_ITERATIONS) return UNKNOWN_ITERATIONS;
  return iterationCount(raw);
}

function encodeIterations(iterations: Iterations): number | undefined {
  switch (iterations.kind) {
    case "none":
      return undefined;
    case "count":
      return iterations.count;
    case "unspecified":
      return UNSPECIFIED_ITERATIONS;
  }
}

export const NonCanonicalActivityWire = z.object({
  evidence: z.array(EvidenceWire),
  iterations: z.number().int().optional(),
  nonElongating: z.boolean().optional(),
  skipped: z.boolean().optional(),
});
export type NonCanonicalActivityWire = z.infer<typeof NonCanonicalActivityWire>;

export interface NonCanonicalActivity {
  readonly evidence: readonly NcaEvidence[];
  readonly iterations: Iterations;
  readonly nonElongating?: boolean;
  readonly skipped?: boolean;
}

export const NonCanonicalActivity = entity<NonCanonicalActivity, NonCanonicalActivityWire>({
  name: "non-canonical activity",
  wire: NonCanonicalActivityWire,
  read: (raw) =>
    compact({
      evidence: raw.evidence.map(NcaEvidence.read),
      iterations: readIterations(raw.iterations),
      nonElongating: raw.nonElongating,
      skipped: raw.skipped,
    }),
  encode: (activity) =>
    compact({
      evidence: activity.evidence.map(NcaEvidence.encode),
      iterations: encodeIterations(activity.iterations),
      nonElongating: activity.nonElongating,
      skipped: activity.skipped,
    }),
  validate: (activity, ctx) => {
    const issues = new Issues();
    issues.each("evidence", activity.evidence, (ev) => NcaEvidence.validate(ev, ctx));
    if (activity.iterations.kind === "count") {
      issues.check(activity.iterations.count >= 1, "iterations", "Iterations must be at least 1");
    }
    return issues.list();
  },
});
