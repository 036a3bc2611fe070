/**
 * The entry aggregate root.
 *
 * An entry owns its whole tree. Validation runs once over the tree with the
 * entry's own quality tier and the caller's record, so nested entities never
 * need to be told the tier separately.
 */

import { z } from "zod";
import { uniqueCitations, type Citation } from "../common/citation.js";
import { CompletenessLevel, QualityLevel, StatusLevel } from "../common/enums.js";
import { evidenceReferences } from "../common/evidence.js";
import { compact, entity, Issues, nonEmpty, type ValidationContext } from "../common/validation.js";
import { ChangeLog, ChangeLogWire } from "../changelog/index.js";
import { Biosynthesis, biosynthesisReferences, BiosynthesisWire } from "../biosynthesis/index.js";
import { Compound, compoundReferences, CompoundWire } from "../compound/index.js";
import { annotationReferences, Genes, GenesWire } from "../genes/index.js";
import { Locus, LocusWire, Taxonomy, TaxonomyWire } from "./locus.js";

export const ACCESSION_PATTERN = /^BGC\d{7}$/;

export interface MibigEntryWire {
  accession: string;
  version: number;
  changelog: ChangeLogWire;
  quality: QualityLevel;
  status: StatusLevel;
  completeness: CompletenessLevel;
  loci: LocusWire[];
  biosynthesis: BiosynthesisWire;
  compounds: CompoundWire[];
  taxonomy: TaxonomyWire;
  genes?: GenesWire;
  retirement_reasons?: string[];
  see_also?: string[];
  comment?: string;
}

export const MibigEntryWire: z.ZodType<MibigEntryWire, z.ZodTypeDef, unknown> = z.object({
  accession: z.string(),
  version: z.number().int(),
  changelog: ChangeLogWire,
  quality: QualityLevel,
  status: StatusLevel,
  completeness: CompletenessLevel,
  loci: z.array(LocusWire),
  biosynthesis: BiosynthesisWire,
  compounds: z.array(CompoundWire),
  taxonomy: TaxonomyWire,
  genes: GenesWire.optional(),
  retirement_reasons: z.array(z.string()).optional(),
  see_also: z.array(z.string()).optional(),
  comment: z.string().optional(),
});

export interface MibigEntry {
  readonly accession: string;
  /** Number of published releases plus one */
  readonly version: number;
  readonly changelog: ChangeLog;
  readonly quality: QualityLevel;
  readonly status: StatusLevel;
  readonly completeness: CompletenessLevel;
  readonly loci: readonly Locus[];
  readonly biosynthesis: Biosynthesis;
  readonly compounds: readonly Compound[];
  readonly taxonomy: Taxonomy;
  readonly genes?: Genes;
  readonly retirementReasons: readonly string[];
  readonly seeAlso: readonly string[];
  readonly comment?: string;
}

/**
 * The context every nested entity of `entry` is validated with.
 */
export function entryContext(entry: MibigEntry, ctx: ValidationContext): ValidationContext {
  return ctx.record ? { quality: entry.quality, record: ctx.record } : { quality: entry.quality };
}

export const MibigEntry = entity<MibigEntry, MibigEntryWire>({
  name: "entry",
  wire: MibigEntryWire,
  read: (raw) =>
    compact({
      accession: raw.accession,
      version: raw.version,
      changelog: ChangeLog.read(raw.changelog),
      quality: raw.quality,
      status: raw.status,
      completeness: raw.completeness,
      loci: raw.loci.map(Locus.read),
      biosynthesis: Biosynthesis.read(raw.biosynthesis),
      compounds: raw.compounds.map(Compound.read),
      taxonomy: Taxonomy.read(raw.taxonomy),
      genes: raw.genes ? Genes.read(raw.genes) : undefined,
      retirementReasons: raw.retirement_reasons ?? [],
      seeAlso: raw.see_also ?? [],
      comment: raw.comment,
    }),
  encode: (entry) =>
    compact({
      accession: entry.accession,
      version: entry.version,
      changelog: ChangeLog.encode(entry.changelog),
      quality: entry.quality,
      status: entry.status,
      completeness: entry.completeness,
      loci: entry.loci.map(Locus.encode),
      biosynthesis: Biosynthesis.encode(entry.biosynthesis),
      compounds: entry.compounds.map(Compound.encode),
      taxonomy: Taxonomy.encode(entry.taxonomy),
      genes: entry.genes ? Genes.encode(entry.genes) : undefined,
      retirement_reasons: nonEmpty(entry.retirementReasons),
      see_also: nonEmpty(entry.seeAlso),
      comment: entry.comment || undefined,
    }),
  validate: (entry, outer) => {
    const ctx = entryContext(entry, outer);
    const issues = new Issues();
    issues.check(ACCESSION_PATTERN.test(entry.accession), "accession", `Invalid accession: ${entry.accession}`);

    const expected = entry.changelog.releases.length + 1;
    if (!Number.isInteger(entry.version) || entry.version < 1) {
      issues.add("version", `Invalid version: ${entry.version}`);
    } else {
      issues.check(
        entry.version === expected,
        "version",
        `Version ${entry.version} does not match the changelog, expected ${expected}`
      );
    }
    issues.nested("changelog", ChangeLog.validate(entry.changelog, ctx));

    if (entry.status === "retired") {
      issues.check(
        entry.retirementReasons.length > 0,
        "retirement_reasons",
        "Retirement reasons must be provided for retired entries"
      );
    }

    issues.check(entry.loci.length > 0, "loci", "At least one locus is required");
    issues.each("loci", entry.loci, (locus) => Locus.validate(locus, ctx));
    issues.nested("biosynthesis", Biosynthesis.validate(entry.biosynthesis, ctx));
    issues.each("compounds", entry.compounds, (compound) => Compound.validate(compound, ctx));
    issues.nested("taxonomy", Taxonomy.validate(entry.taxonomy, ctx));
    if (entry.genes) {
      issues.nested("genes", Genes.validate(entry.genes, ctx));
    }
    return issues.list();
  },
});

/**
 * Every citation anywhere in the entry, deduplicated and sorted.
 */
export function entryReferences(entry: MibigEntry): Citation[] {
  return uniqueCitations([
    ...entry.loci.flatMap((locus) => evidenceReferences(locus.evidence)),
    ...biosynthesisReferences(entry.biosynthesis),
    ...entry.compounds.flatMap(compoundReferences),
    ...(entry.genes?.annotations.flatMap(annotationReferences) ?? []),
  ]);
}
