/**
 * Evidence kinds.
 *
 * Every kind is a (method, references) pair whose method comes from a closed,
 * kind-specific vocabulary. Sequence-based predictions never need references;
 * any other method needs at least one once the entry is past the lowest tier.
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  validateCitationList,
  type Citation,
} from "./citation.js";
import { compact, entity, Issues, nonEmpty, type Codec } from "./validation.js";

export const PREDICTION_METHOD = "Sequence-based prediction";

export const EvidenceWire = z.object({
  method: z.string(),
  references: CitationList.optional(),
});
export type EvidenceWire = z.infer<typeof EvidenceWire>;

export interface Evidence {
  readonly method: string;
  readonly references: readonly Citation[];
}

export type EvidenceCodec = Codec<Evidence, EvidenceWire> & {
  readonly methods: readonly string[];
};

/**
 * Build the codec of one evidence kind.
 */
function evidenceKind(name: string, methods: readonly string[]): EvidenceCodec {
  const codec = entity<Evidence, EvidenceWire>({
    name,
    wire: EvidenceWire,
    read: (raw) => ({ method: raw.method, references: readCitations(raw.references) }),
    encode: (evidence) =>
      compact({
        method: evidence.method,
        references: nonEmpty(encodeCitations(evidence.references)),
      }),
    validate: (evidence, ctx) => {
      const issues = new Issues();
      issues.check(methods.includes(evidence.method), "method", `Invalid method '${evidence.method}'`);
      if (evidence.method === PREDICTION_METHOD) {
        issues.nested("references", validateCitationList(evidence.references, { ...ctx, quality: "questionable" }));
      } else {
        issues.nested(
          "references",
          validateCitationList(evidence.references, ctx, "References are required for non-questionable entries")
        );
      }
      return issues.list();
    },
  });
  return { ...codec, methods };
}

export const SubstrateEvidence = evidenceKind("substrate evidence", [
  "Activity assay",
  "ACVS assay",
  "ATP-PPi exchange assay",
  "Enzyme-coupled assay",
  "Feeding study",
  "Heterologous expression",
  "Homology",
  "HPLC",
  "In-vitro experiments",
  "Knock-out studies",
  "Mass spectrometry",
  "NMR",
  "Radio labelling",
  PREDICTION_METHOD,
  "Steady-state kinetics",
  "Structure-based inference",
  "X-ray crystallography",
]);
export type SubstrateEvidence = Evidence;

export const LocusEvidence = evidenceKind("locus evidence", [
  "Homology-based prediction",
  "Correlation of genomic and metabolomic data",
  "Gene expression correlated with compound production",
  "Knock-out studies",
  "Enzymatic assays",
  "Heterologous expression",
  "In vitro expression",
]);
export type LocusEvidence = Evidence;

export const OperonEvidence = evidenceKind("operon evidence", [
  PREDICTION_METHOD,
  "RACE",
  "ChIPseq",
  "RNAseq",
  "rt-PCR",
]);
export type OperonEvidence = Evidence;

export const GTEvidence = evidenceKind("glycosyltransferase evidence", [
  PREDICTION_METHOD,
  "Structure-based inference",
  "Knock-out construct",
  "Activity assay",
]);
export type GTEvidence = Evidence;

export const NcaEvidence = evidenceKind("non-canonical activity evidence", [
  PREDICTION_METHOD,
  "Structure-based inference",
  "Activity assay",
]);
export type NcaEvidence = Evidence;

export const FunctionEvidence = evidenceKind("function evidence", [
  "Other in vivo study",
  "Heterologous expression",
  "Knock-out",
  "Activity assay",
]);
export type FunctionEvidence = Evidence;

export const CompoundEvidence = evidenceKind("compound evidence", [
  "NMR",
  "Mass spectrometry",
  "MS/MS",
  "X-ray cristallography",
  "Chemical derivatisation",
  "Total synthesis",
]);
export type CompoundEvidence = Evidence;

/**
 * Citations backing a list of evidence items.
 */
export function evidenceReferences(evidence: readonly Evidence[]): Citation[] {
  return evidence.flatMap((item) => item.references);
}
