/**
 * Read model of the legacy (v3) document.
 *
 * The legacy corpus was edited by hand for years, so these schemas are
 * permissive: unknown keys pass through and most keys are optional. Only
 * the invariants the migration relies on are enforced here.
 */

import { z } from "zod";
import { parseWire } from "../common/validation.js";

const LEGACY_VERSION_PATTERN = /^\d+(\.\d+)*$/;

// ═══════════════════════════════════════════════════════════════════════════
// SHARED
// ═══════════════════════════════════════════════════════════════════════════

const LegacyNonCanonical = z
  .object({
    evidence: z.array(z.string()).optional(),
    iterated: z.boolean().optional(),
    non_elongating: z.boolean().optional(),
    skipped: z.boolean().optional(),
  })
  .passthrough();
export type LegacyNonCanonical = z.infer<typeof LegacyNonCanonical>;

const LegacyThioesterase = z
  .object({
    gene: z.string(),
    thioesterase_type: z.string().optional(),
  })
  .passthrough();

// ═══════════════════════════════════════════════════════════════════════════
// CLASS BLOCKS
// ═══════════════════════════════════════════════════════════════════════════

const LegacySpecificity = z
  .object({
    aa_subcluster: z.array(z.string()).optional(),
    epimerized: z.boolean().optional(),
    evidence: z.array(z.string()).optional(),
    proteinogenic: z.array(z.string()).optional(),
    nonproteinogenic: z.array(z.string()).optional(),
    publications: z.array(z.string()).optional(),
  })
  .passthrough();
export type LegacySpecificity = z.infer<typeof LegacySpecificity>;

const LegacyNrpsModule = z
  .object({
    module_number: z.string().optional(),
    active: z.boolean().optional(),
    c_dom_subtype: z.string().optional(),
    comments: z.string().optional(),
    modification_domains: z.array(z.string()).optional(),
    a_substr_spec: LegacySpecificity.optional(),
    non_canonical: LegacyNonCanonical.optional(),
  })
  .passthrough();
export type LegacyNrpsModule = z.infer<typeof LegacyNrpsModule>;

const LegacyNrpsGene = z
  .object({
    gene_id: z.string(),
    modules: z.array(LegacyNrpsModule).optional(),
  })
  .passthrough();
export type LegacyNrpsGene = z.infer<typeof LegacyNrpsGene>;

const LegacyNrp = z
  .object({
    release_type: z.array(z.string()).optional(),
    subclass: z.string().optional(),
    thioesterases: z.array(LegacyThioesterase).optional(),
    nrps_genes: z.array(LegacyNrpsGene).optional(),
  })
  .passthrough();
export type LegacyNrp = z.infer<typeof LegacyNrp>;

const LegacyPksModule = z
  .object({
    at_specificities: z.array(z.string()).optional(),
    domains: z.array(z.string()).optional(),
    evidence: z.string().optional(),
    genes: z.array(z.string()).optional(),
    kr_stereochem: z.string().optional(),
    module_number: z.string().optional(),
    non_canonical: LegacyNonCanonical.optional(),
    pks_mod_doms: z.array(z.string()).optional(),
  })
  .passthrough();
export type LegacyPksModule = z.infer<typeof LegacyPksModule>;

const LegacySynthase = z
  .object({
    genes: z.array(z.string()),
    subclass: z.array(z.string()).optional(),
    modules: z.array(LegacyPksModule).optional(),
  })
  .passthrough();
export type LegacySynthase = z.infer<typeof LegacySynthase>;

const LegacyPolyketide = z
  .object({
    subclasses: z.array(z.string()).optional(),
    cyclases: z.array(z.string()).optional(),
    ketide_length: z.number().optional(),
    starter_unit: z.array(z.string()).optional(),
    synthases: z.array(LegacySynthase).optional(),
  })
  .passthrough();
export type LegacyPolyketide = z.infer<typeof LegacyPolyketide>;

const LegacyCrosslink = z
  .object({
    crosslink_type: z.string(),
    first_AA: z.number().int().optional(),
    second_AA: z.number().int().optional(),
  })
  .passthrough();

const LegacyPrecursorGene = z
  .object({
    gene_id: z.string(),
    core_sequence: z.array(z.string()),
    crosslinks: z.array(LegacyCrosslink).optional(),
    leader_sequence: z.string().optional(),
    follower_sequence: z.string().optional(),
    recognition_motif: z.string().optional(),
  })
  .passthrough();
export type LegacyPrecursorGene = z.infer<typeof LegacyPrecursorGene>;

const LegacyRipp = z
  .object({
    subclass: z.string().optional(),
    peptidases: z.array(z.string()).optional(),
    precursor_genes: z.array(LegacyPrecursorGene).optional(),
  })
  .passthrough();
export type LegacyRipp = z.infer<typeof LegacyRipp>;

const LegacySaccharide = z
  .object({
    subclass: z.string().optional(),
    glycosyltransferases: z
      .array(
        z
          .object({
            gene_id: z.string(),
            evidence: z.array(z.string()),
            specificity: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
    sugar_subclusters: z.array(z.array(z.string())).optional(),
  })
  .passthrough();
export type LegacySaccharide = z.infer<typeof LegacySaccharide>;

const LegacyTerpene = z
  .object({
    carbon_count_subclass: z.string().optional(),
    structural_subclass: z.string().optional(),
    prenyltransferases: z.array(z.string()).optional(),
    terpene_precursor: z.string().optional(),
    terpene_synth_cycl: z.array(z.string()).optional(),
  })
  .passthrough();
export type LegacyTerpene = z.infer<typeof LegacyTerpene>;

const LegacySubclassOnly = z.object({ subclass: z.string().optional() }).passthrough();

// ═══════════════════════════════════════════════════════════════════════════
// GENES, LOCI, COMPOUNDS
// ═══════════════════════════════════════════════════════════════════════════

const LegacyDomainSubstrate = z
  .object({
    name: z.string(),
    structure: z.string().optional(),
    evidence: z.array(z.string()).optional(),
    publications: z.array(z.string()).optional(),
  })
  .passthrough();

const LegacyGeneDomain = z
  .object({
    name: z.string(),
    location: z.object({ begin: z.number().int(), end: z.number().int() }),
    substrates: z.array(LegacyDomainSubstrate).optional(),
  })
  .passthrough();
export type LegacyGeneDomain = z.infer<typeof LegacyGeneDomain>;

const LegacyAnnotation = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    product: z.string().optional(),
    comments: z.string().optional(),
    mut_pheno: z.string().optional(),
    publications: z.array(z.string()).optional(),
    tailoring: z.array(z.string()).optional(),
    domains: z.array(LegacyGeneDomain).optional(),
  })
  .passthrough();
export type LegacyAnnotation = z.infer<typeof LegacyAnnotation>;

const LegacyExtraGene = z
  .object({
    id: z.string(),
    location: z
      .object({
        exons: z.array(z.object({ start: z.number().int(), end: z.number().int() })),
        strand: z.number().int(),
      })
      .optional(),
    translation: z.string().optional(),
  })
  .passthrough();
export type LegacyExtraGene = z.infer<typeof LegacyExtraGene>;

const LegacyOperon = z
  .object({
    genes: z.array(z.string()),
    evidence: z.array(z.string()),
  })
  .passthrough();
export type LegacyOperon = z.infer<typeof LegacyOperon>;

const LegacyGenes = z
  .object({
    annotations: z.array(LegacyAnnotation).optional(),
    extra_genes: z.array(LegacyExtraGene).optional(),
    operons: z.array(LegacyOperon).optional(),
  })
  .passthrough();
export type LegacyGenes = z.infer<typeof LegacyGenes>;

const LegacyLoci = z
  .object({
    accession: z.string(),
    completeness: z.string(),
    start_coord: z.number().int().optional(),
    end_coord: z.number().int().optional(),
    mixs_compliant: z.boolean().optional(),
    evidence: z.array(z.string()).optional(),
  })
  .passthrough();
export type LegacyLoci = z.infer<typeof LegacyLoci>;

const LegacyCompound = z
  .object({
    compound: z.string(),
    database_id: z.array(z.string()).optional(),
    mol_mass: z.number().optional(),
    molecular_formula: z.string().optional(),
    chem_struct: z.string().optional(),
    chem_synonyms: z.array(z.string()).optional(),
  })
  .passthrough();
export type LegacyCompound = z.infer<typeof LegacyCompound>;

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

const LegacyCluster = z
  .object({
    biosyn_class: z.array(z.string()).min(1, "At least one biosynthetic class is required"),
    mibig_accession: z
      .string()
      .refine(
        (value) => value.startsWith("BGC") && value.length === 10,
        (value) => ({ message: `Invalid accession: ${value}` })
      ),
    status: z.string().optional(),
    retirement_reasons: z.array(z.string()).optional(),
    see_also: z.array(z.string()).optional(),
    minimal: z.boolean().optional(),
    organism_name: z.string(),
    ncbi_tax_id: z.union([z.string(), z.number()]),
    loci: LegacyLoci.optional(),
    compounds: z.array(LegacyCompound),
    publications: z.array(z.string()).optional(),
    genes: LegacyGenes.optional(),
    nrp: LegacyNrp.optional(),
    polyketide: LegacyPolyketide.optional(),
    ripp: LegacyRipp.optional(),
    saccharide: LegacySaccharide.optional(),
    terpene: LegacyTerpene.optional(),
    other: LegacySubclassOnly.optional(),
    alkaloid: LegacySubclassOnly.optional(),
  })
  .passthrough();
export type LegacyCluster = z.infer<typeof LegacyCluster>;

const LegacyChange = z
  .object({
    version: z
      .string()
      .refine(
        (value) => value === "next" || LEGACY_VERSION_PATTERN.test(value),
        (value) => ({ message: `Invalid changelog version: ${value}` })
      ),
    comments: z.array(z.string()),
    contributors: z.array(z.string()),
    updated_at: z.array(z.string()).optional(),
  })
  .passthrough();
export type LegacyChange = z.infer<typeof LegacyChange>;

export interface LegacyDocument {
  cluster: LegacyCluster;
  changelog: LegacyChange[];
  comments?: string;
  [key: string]: unknown;
}

export const LegacyDocument: z.ZodType<LegacyDocument, z.ZodTypeDef, unknown> = z
  .object({
    cluster: LegacyCluster,
    changelog: z.array(LegacyChange),
    comments: z.string().optional(),
  })
  .passthrough();

/**
 * Parse a decoded legacy JSON document.
 *
 * @throws ValidationError listing every structural mismatch
 */
export function readLegacyDocument(raw: unknown): LegacyDocument {
  return parseWire(LegacyDocument, raw, "legacy document");
}

/**
 * Human-readable label of one legacy class, with the subclass details the
 * document carries for it, e.g. "Polyketide (Type I)".
 */
export function describeLegacyClass(cluster: LegacyCluster, name: string): string {
  const detail = (subclass: string | undefined) => (subclass ? `${name} (${subclass})` : name);
  switch (name) {
    case "Polyketide": {
      const subclasses = cluster.polyketide?.subclasses ?? [];
      return subclasses.length > 0 ? `${name} (${subclasses.join(", ")})` : name;
    }
    case "Terpene": {
      const terpene = cluster.terpene;
      if (!terpene || (!terpene.carbon_count_subclass && !terpene.structural_subclass)) {
        return name;
      }
      return `${name} (${terpene.carbon_count_subclass ?? "Unknown"}/${terpene.structural_subclass ?? "Unknown"})`;
    }
    case "NRP":
      return detail(cluster.nrp?.subclass);
    case "RiPP":
      return detail(cluster.ripp?.subclass);
    case "Saccharide":
      return detail(cluster.saccharide?.subclass);
    case "Other":
      return detail(cluster.other?.subclass);
    case "Alkaloid":
      return detail(cluster.alkaloid?.subclass);
    default:
      return name;
  }
}
