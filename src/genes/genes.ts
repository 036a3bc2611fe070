/**
 * Gene-level curation: genes missing from the reference record, genes to
 * ignore, and per-gene annotations.
 */

import { z } from "zod";
import type { Citation } from "../common/citation.js";
import { GeneId, Location, LocationWire, NovelGeneId, validateLocation } from "../common/primitives.js";
import { compact, entity, isRelaxed, Issues, nonEmpty } from "../common/validation.js";
import { Domain, DomainWire } from "../biosynthesis/domains/domain.js";
import { domainReferences } from "../biosynthesis/domains/payloads.js";
import {
  GeneFunction,
  geneFunctionReferences,
  GeneFunctionWire,
  MutationPhenotype,
  MutationPhenotypeWire,
  TailoringFunction,
  TailoringFunctionWire,
} from "./functions.js";

export const AMINO_ACIDS = "ACDEFGHIKLMNPQRSTVWY";

const TRANSLATION_PATTERN = new RegExp(`^[${AMINO_ACIDS}]+$`);

// ═══════════════════════════════════════════════════════════════════════════
// ADDITIONS AND DELETIONS
// ═══════════════════════════════════════════════════════════════════════════

export const GeneLocationWire = z.object({
  exons: z.array(LocationWire),
  strand: z.number().int(),
});
export type GeneLocationWire = z.infer<typeof GeneLocationWire>;

export interface GeneLocation {
  readonly exons: readonly Location[];
  readonly strand: number;
}

export const GeneLocation = entity<GeneLocation, GeneLocationWire>({
  name: "gene location",
  wire: GeneLocationWire,
  read: (raw) => ({ exons: raw.exons.map(Location.read), strand: raw.strand }),
  encode: (location) => ({ exons: location.exons.map(Location.encode), strand: location.strand }),
  validate: (location, ctx) =>
    new Issues()
      .check(location.exons.length > 0, "exons", "At least one exon must be provided")
      .each("exons", location.exons, (exon) => validateLocation(exon, ctx))
      .check(location.strand === 1 || location.strand === -1, "strand", "Strand must be either -1 or 1")
      .list(),
});

export const AdditionWire = z.object({
  id: z.string(),
  location: GeneLocationWire,
  translation: z.string().optional(),
});
export type AdditionWire = z.infer<typeof AdditionWire>;

/** A gene the reference record lacks */
export interface Addition {
  readonly id: NovelGeneId;
  readonly location: GeneLocation;
  readonly translation?: string;
}

export const Addition = entity<Addition, AdditionWire>({
  name: "gene addition",
  wire: AdditionWire,
  read: (raw) => compact({ id: raw.id, location: GeneLocation.read(raw.location), translation: raw.translation }),
  encode: (addition) =>
    compact({
      id: addition.id,
      location: GeneLocation.encode(addition.location),
      translation: addition.translation || undefined,
    }),
  validate: (addition, ctx) => {
    const issues = new Issues();
    issues.nested("id", NovelGeneId.validate(addition.id, ctx));
    issues.nested("location", GeneLocation.validate(addition.location, ctx));
    issues.check(
      isRelaxed(ctx) || Boolean(addition.translation),
      "translation",
      "Translation must be provided"
    );
    if (addition.translation) {
      issues.check(
        TRANSLATION_PATTERN.test(addition.translation),
        "translation",
        "Invalid amino acid in translation"
      );
    }
    return issues.list();
  },
});

export const DeletionWire = z.object({
  id: z.string(),
  reason: z.string(),
});
export type DeletionWire = z.infer<typeof DeletionWire>;

export interface Deletion {
  readonly id: GeneId;
  readonly reason: string;
}

export const Deletion = entity<Deletion, DeletionWire>({
  name: "gene deletion",
  wire: DeletionWire,
  read: (raw) => ({ id: raw.id, reason: raw.reason }),
  encode: (deletion) => ({ id: deletion.id, reason: deletion.reason }),
  validate: (deletion, ctx) =>
    new Issues()
      .nested("id", GeneId.validate(deletion.id, ctx))
      .check(Boolean(deletion.reason), "reason", "Reason must be provided")
      .list(),
});

// ═══════════════════════════════════════════════════════════════════════════
// ANNOTATIONS
// ═══════════════════════════════════════════════════════════════════════════

export const AnnotationWire = z.object({
  id: z.string(),
  name: z.string().optional(),
  aliases: z.array(z.string()).optional(),
  product: z.string().optional(),
  functions: z.array(GeneFunctionWire).optional(),
  tailoring_functions: z.array(TailoringFunctionWire).optional(),
  domains: z.array(DomainWire).optional(),
  mutation_phenotype: MutationPhenotypeWire.optional(),
  comment: z.string().optional(),
});
export type AnnotationWire = z.infer<typeof AnnotationWire>;

export interface Annotation {
  readonly id: GeneId;
  readonly name?: NovelGeneId;
  readonly aliases: readonly NovelGeneId[];
  readonly product?: string;
  readonly functions: readonly GeneFunction[];
  readonly tailoringFunctions: readonly TailoringFunction[];
  readonly domains: readonly Domain[];
  readonly mutationPhenotype?: MutationPhenotype;
  readonly comment?: string;
}

export const Annotation = entity<Annotation, AnnotationWire>({
  name: "gene annotation",
  wire: AnnotationWire,
  read: (raw) =>
    compact({
      id: raw.id,
      name: raw.name,
      aliases: raw.aliases ?? [],
      product: raw.product,
      functions: (raw.functions ?? []).map(GeneFunction.read),
      tailoringFunctions: (raw.tailoring_functions ?? []).map(TailoringFunction.read),
      domains: (raw.domains ?? []).map(Domain.read),
      mutationPhenotype: raw.mutation_phenotype ? MutationPhenotype.read(raw.mutation_phenotype) : undefined,
      comment: raw.comment,
    }),
  encode: (annotation) =>
    compact({
      id: annotation.id,
      name: annotation.name || undefined,
      aliases: nonEmpty(annotation.aliases),
      product: annotation.product || undefined,
      functions: nonEmpty(annotation.functions.map(GeneFunction.encode)),
      tailoring_functions: nonEmpty(annotation.tailoringFunctions.map(TailoringFunction.encode)),
      domains: nonEmpty(annotation.domains.map(Domain.encode)),
      mutation_phenotype: annotation.mutationPhenotype
        ? MutationPhenotype.encode(annotation.mutationPhenotype)
        : undefined,
      comment: annotation.comment || undefined,
    }),
  validate: (annotation, ctx) => {
    const issues = new Issues();
    issues.nested("id", GeneId.validate(annotation.id, ctx));
    if (annotation.name) {
      issues.nested("name", NovelGeneId.validate(annotation.name, ctx));
    }
    issues.each("aliases", annotation.aliases, (alias) => NovelGeneId.validate(alias, ctx));
    issues.each("functions", annotation.functions, (fn) => GeneFunction.validate(fn, ctx));
    issues.each("tailoring_functions", annotation.tailoringFunctions, (fn) => TailoringFunction.validate(fn, ctx));
    issues.each("domains", annotation.domains, (domain) => Domain.validate(domain, ctx));
    if (annotation.mutationPhenotype) {
      issues.nested("mutation_phenotype", MutationPhenotype.validate(annotation.mutationPhenotype, ctx));
    }
    return issues.list();
  },
});

export function annotationReferences(annotation: Annotation): Citation[] {
  return [
    ...annotation.functions.flatMap(geneFunctionReferences),
    ...annotation.tailoringFunctions.flatMap((fn) => fn.references),
    ...annotation.domains.flatMap((domain) => domainReferences(domain.info)),
    ...(annotation.mutationPhenotype?.references ?? []),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// GENES
// ═══════════════════════════════════════════════════════════════════════════

export const GenesWire = z.object({
  to_add: z.array(AdditionWire).optional(),
  to_delete: z.array(DeletionWire).optional(),
  annotations: z.array(AnnotationWire).optional(),
});
export type GenesWire = z.infer<typeof GenesWire>;

export interface Genes {
  readonly toAdd: readonly Addition[];
  readonly toDelete: readonly Deletion[];
  readonly annotations: readonly Annotation[];
}

export const Genes = entity<Genes, GenesWire>({
  name: "genes",
  wire: GenesWire,
  read: (raw) => ({
    toAdd: (raw.to_add ?? []).map(Addition.read),
    toDelete: (raw.to_delete ?? []).map(Deletion.read),
    annotations: (raw.annotations ?? []).map(Annotation.read),
  }),
  encode: (genes) =>
    compact({
      to_add: nonEmpty(genes.toAdd.map(Addition.encode)),
      to_delete: nonEmpty(genes.toDelete.map(Deletion.encode)),
      annotations: nonEmpty(genes.annotations.map(Annotation.encode)),
    }),
  validate: (genes, ctx) =>
    new Issues()
      .each("to_add", genes.toAdd, (addition) => Addition.validate(addition, ctx))
      .each("to_delete", genes.toDelete, (deletion) => Deletion.validate(deletion, ctx))
      .each("annotations", genes.annotations, (annotation) => Annotation.validate(annotation, ctx))
      .list(),
});

/** Whether there is nothing to curate */
export function isEmptyGenes(genes: Genes): boolean {
  return genes.toAdd.length === 0 && genes.toDelete.length === 0 && genes.annotations.length === 0;
}
