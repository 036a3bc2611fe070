/**
 * Saccharide class payload: glycosyltransferases and sugar subclusters.
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  validateCitationList,
  type Citation,
} from "../../common/citation.js";
import type { ValidationIssue } from "../../common/errors.js";
import { evidenceReferences, EvidenceWire, GTEvidence } from "../../common/evidence.js";
import { GeneId, GeneIdList, validateSmiles, type Smiles } from "../../common/primitives.js";
import { compact, entity, Issues, nonEmpty, type ValidationContext } from "../../common/validation.js";

/**
 * Specificity of glycosyltransferases carried over from records that never
 * stated one. Kept visible so curators can find and replace it.
 */
export const UNMIGRATED_GT_SPECIFICITY: Smiles = "[To][Do]";

// ═══════════════════════════════════════════════════════════════════════════
// GLYCOSYLTRANSFERASES
// ═══════════════════════════════════════════════════════════════════════════

export const GlycosyltransferaseWire = z.object({
  gene: z.string(),
  evidence: z.array(EvidenceWire),
  specificity: z.string().optional(),
});
export type GlycosyltransferaseWire = z.infer<typeof GlycosyltransferaseWire>;

export interface Glycosyltransferase {
  readonly gene: GeneId;
  readonly evidence: readonly GTEvidence[];
  readonly specificity?: Smiles;
}

export const Glycosyltransferase = entity<Glycosyltransferase, GlycosyltransferaseWire>({
  name: "glycosyltransferase",
  wire: GlycosyltransferaseWire,
  read: (raw) =>
    compact({ gene: raw.gene, evidence: raw.evidence.map(GTEvidence.read), specificity: raw.specificity }),
  encode: (gt) =>
    compact({
      gene: gt.gene,
      evidence: gt.evidence.map(GTEvidence.encode),
      specificity: gt.specificity || undefined,
    }),
  validate: (gt, ctx) => {
    const issues = new Issues();
    issues.nested("gene", GeneId.validate(gt.gene, ctx));
    issues.each("evidence", gt.evidence, (evidence) => GTEvidence.validate(evidence, ctx));
    if (gt.specificity) {
      issues.nested("specificity", validateSmiles(gt.specificity));
    }
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// SUBCLUSTERS
// ═══════════════════════════════════════════════════════════════════════════

export const SubclusterWire = z.object({
  genes: GeneIdList,
  references: CitationList,
});
export type SubclusterWire = z.infer<typeof SubclusterWire>;

/** Genes that together build one sugar moiety */
export interface Subcluster {
  readonly genes: readonly GeneId[];
  readonly references: readonly Citation[];
}

export const Subcluster = entity<Subcluster, SubclusterWire>({
  name: "subcluster",
  wire: SubclusterWire,
  read: (raw) => ({ genes: raw.genes, references: readCitations(raw.references) }),
  encode: (subcluster) => ({ genes: [...subcluster.genes], references: encodeCitations(subcluster.references) }),
  validate: (subcluster, ctx) =>
    new Issues()
      .each("genes", subcluster.genes, (gene) => GeneId.validate(gene, ctx))
      .nested("references", validateCitationList(subcluster.references, ctx))
      .list(),
});

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════

export interface SaccharideClassInfo {
  readonly kind: "saccharide";
  readonly subclass?: string;
  readonly glycosyltransferases: readonly Glycosyltransferase[];
  readonly subclusters: readonly Subcluster[];
}

export const SaccharideClassWire = z.object({
  glycosyltransferases: z.array(GlycosyltransferaseWire),
  subclass: z.string().optional(),
  subclusters: z.array(SubclusterWire).optional(),
});
export type SaccharideClassWire = z.infer<typeof SaccharideClassWire>;

export function readSaccharideClass(raw: SaccharideClassWire): SaccharideClassInfo {
  return compact<SaccharideClassInfo>({
    kind: "saccharide",
    subclass: raw.subclass,
    glycosyltransferases: raw.glycosyltransferases.map(Glycosyltransferase.read),
    subclusters: (raw.subclusters ?? []).map(Subcluster.read),
  });
}

export function encodeSaccharideClass(info: SaccharideClassInfo): SaccharideClassWire {
  return compact({
    glycosyltransferases: info.glycosyltransferases.map(Glycosyltransferase.encode),
    subclass: info.subclass || undefined,
    subclusters: nonEmpty(info.subclusters.map(Subcluster.encode)),
  });
}

export function validateSaccharideClass(info: SaccharideClassInfo, ctx: ValidationContext): ValidationIssue[] {
  return new Issues()
    .each("glycosyltransferases", info.glycosyltransferases, (gt) => Glycosyltransferase.validate(gt, ctx))
    .each("subclusters", info.subclusters, (subcluster) => Subcluster.validate(subcluster, ctx))
    .list();
}

export function saccharideClassReferences(info: SaccharideClassInfo): Citation[] {
  return [
    ...info.subclusters.flatMap((subcluster) => subcluster.references),
    ...info.glycosyltransferases.flatMap((gt) => evidenceReferences(gt.evidence)),
  ];
}
