/**
 * Operons: genes transcribed together.
 */

import { z } from "zod";
import { EvidenceWire, OperonEvidence } from "../common/evidence.js";
import { GeneId, GeneIdList } from "../common/primitives.js";
import { entity, Issues } from "../common/validation.js";

export const OperonWire = z.object({
  genes: GeneIdList,
  evidence: z.array(EvidenceWire),
});
export type OperonWire = z.infer<typeof OperonWire>;

export interface Operon {
  readonly genes: readonly GeneId[];
  readonly evidence: readonly OperonEvidence[];
}

export const Operon = entity<Operon, OperonWire>({
  name: "operon",
  wire: OperonWire,
  read: (raw) => ({ genes: raw.genes, evidence: raw.evidence.map(OperonEvidence.read) }),
  encode: (operon) => ({
    genes: [...operon.genes],
    evidence: operon.evidence.map(OperonEvidence.encode),
  }),
  validate: (operon, ctx) =>
    new Issues()
      .check(operon.genes.length > 0, "genes", "At least one gene is required")
      .each("genes", operon.genes, (gene) => GeneId.validate(gene, ctx))
      .each("evidence", operon.evidence, (evidence) => OperonEvidence.validate(evidence, ctx))
      .list(),
});
