/**
 * Gene function annotations: general roles, tailoring reactions and
 * mutation phenotypes.
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  uniqueCitations,
  validateCitationList,
  type Citation,
} from "../common/citation.js";
import { evidenceReferences, EvidenceWire, FunctionEvidence } from "../common/evidence.js";
import { compact, entity, Issues } from "../common/validation.js";

export const GeneFunctionName = z.enum([
  "Activation / processing",
  "Maturation",
  "Precursor",
  "Precursor biosynthesis",
  "Regulation",
  "Resistance/immunity",
  "Scaffold biosynthesis",
  "Tailoring",
  "Transport",
  "Other",
]);
export type GeneFunctionName = z.infer<typeof GeneFunctionName>;

export const TailoringFunctionName = z.enum([
  "Acetylation",
  "Acylation",
  "Amination",
  "Biaryl bond formation",
  "Carboxylation",
  "Cyclization",
  "Deamination",
  "Decarboxylation",
  "Dehydration",
  "Dehydrogenation",
  "Demethylation",
  "Dioxygenation",
  "Epimerization",
  "FADH2 supply for chlorination",
  "Glycosylation",
  "Halogenation",
  "Heterocyclization",
  "Hydrolysis",
  "Hydroxylation",
  "Lasso macrolactam formation",
  "Methylation",
  "Monooxygenation",
  "Oxidation",
  "Phosphorylation",
  "Prenylation",
  "Reduction",
  "Sulfation",
  "Other",
]);
export type TailoringFunctionName = z.infer<typeof TailoringFunctionName>;

/** Reference into the MITE tailoring enzyme database */
export const MITE_REFERENCE_PATTERN = /^mite:MITE\d{7}$/;

// ═══════════════════════════════════════════════════════════════════════════
// MUTATION PHENOTYPE
// ═══════════════════════════════════════════════════════════════════════════

export const MutationPhenotypeWire = z.object({
  phenotype: z.string(),
  details: z.string().optional(),
  references: CitationList,
});
export type MutationPhenotypeWire = z.infer<typeof MutationPhenotypeWire>;

export interface MutationPhenotype {
  readonly phenotype: string;
  readonly details?: string;
  readonly references: readonly Citation[];
}

export const MutationPhenotype = entity<MutationPhenotype, MutationPhenotypeWire>({
  name: "mutation phenotype",
  wire: MutationPhenotypeWire,
  read: (raw) =>
    compact({ phenotype: raw.phenotype, details: raw.details, references: readCitations(raw.references) }),
  encode: (phenotype) =>
    compact({
      phenotype: phenotype.phenotype,
      details: phenotype.details || undefined,
      references: encodeCitations(phenotype.references),
    }),
  validate: (phenotype, ctx) =>
    new Issues()
      .check(Boolean(phenotype.phenotype), "phenotype", "Phenotype must be provided")
      .nested("references", validateCitationList(phenotype.references, ctx))
      .list(),
});

// ═══════════════════════════════════════════════════════════════════════════
// GENE FUNCTION
// ═══════════════════════════════════════════════════════════════════════════

export const GeneFunctionWire = z.object({
  function: z.object({
    name: z.string(),
    details: z.string().optional(),
  }),
  evidence: z.array(EvidenceWire),
  mutation_phenotype: MutationPhenotypeWire.optional(),
});
export type GeneFunctionWire = z.infer<typeof GeneFunctionWire>;

export interface GeneFunction {
  readonly function: string;
  readonly details?: string;
  readonly evidence: readonly FunctionEvidence[];
  readonly mutationPhenotype?: MutationPhenotype;
}

export const GeneFunction = entity<GeneFunction, GeneFunctionWire>({
  name: "gene function",
  wire: GeneFunctionWire,
  read: (raw) =>
    compact({
      function: raw.function.name,
      details: raw.function.details,
      evidence: raw.evidence.map(FunctionEvidence.read),
      mutationPhenotype: raw.mutation_phenotype ? MutationPhenotype.read(raw.mutation_phenotype) : undefined,
    }),
  encode: (fn) =>
    compact({
      function: compact({ name: fn.function, details: fn.details || undefined }),
      evidence: fn.evidence.map(FunctionEvidence.encode),
      mutation_phenotype: fn.mutationPhenotype ? MutationPhenotype.encode(fn.mutationPhenotype) : undefined,
    }),
  validate: (fn, ctx) => {
    const issues = new Issues();
    issues.check(GeneFunctionName.safeParse(fn.function).success, "function", `Invalid function: ${fn.function}`);
    if (fn.function === "Other") {
      issues.check(Boolean(fn.details), "details", "Details must be provided for 'Other' function");
    }
    issues.each("evidence", fn.evidence, (evidence) => FunctionEvidence.validate(evidence, ctx));
    if (fn.mutationPhenotype) {
      issues.nested("mutation_phenotype", MutationPhenotype.validate(fn.mutationPhenotype, ctx));
    }
    return issues.list();
  },
});

export function geneFunctionReferences(fn: GeneFunction): Citation[] {
  return uniqueCitations([
    ...evidenceReferences(fn.evidence),
    ...(fn.mutationPhenotype?.references ?? []),
  ]);
}

// ═══════════════════════════════════════════════════════════════════════════
// TAILORING FUNCTION
// ═══════════════════════════════════════════════════════════════════════════

export const TailoringFunctionWire = z.object({
  function: z.string(),
  references: CitationList,
  db_reference: z.string().optional(),
  details: z.string().optional(),
});
export type TailoringFunctionWire = z.infer<typeof TailoringFunctionWire>;

export interface TailoringFunction {
  readonly function: string;
  readonly references: readonly Citation[];
  readonly dbReference?: string;
  readonly details?: string;
}

export const TailoringFunction = entity<TailoringFunction, TailoringFunctionWire>({
  name: "tailoring function",
  wire: TailoringFunctionWire,
  read: (raw) =>
    compact({
      function: raw.function,
      references: readCitations(raw.references),
      dbReference: raw.db_reference,
      details: raw.details,
    }),
  encode: (fn) =>
    compact({
      function: fn.function,
      references: encodeCitations(fn.references),
      db_reference: fn.dbReference || undefined,
      details: fn.details || undefined,
    }),
  validate: (fn, ctx) => {
    const issues = new Issues();
    issues.check(
      TailoringFunctionName.safeParse(fn.function).success,
      "function",
      `Invalid tailoring function: ${fn.function}`
    );
    if (fn.function === "Other") {
      issues.check(Boolean(fn.details), "details", "Details must be provided for 'Other' tailoring function");
    }
    issues.nested("references", validateCitationList(fn.references, ctx));
    if (fn.dbReference) {
      issues.check(
        MITE_REFERENCE_PATTERN.test(fn.dbReference),
        "db_reference",
        `Invalid database reference ${fn.dbReference}`
      );
    }
    return issues.list();
  },
});
