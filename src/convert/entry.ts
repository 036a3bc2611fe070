/**
 * Whole-document migration from the legacy v3 layout to a v4 entry.
 */

import { CompletenessLevel, StatusLevel } from "../common/enums.js";
import { MigrationError } from "../common/errors.js";
import { compact, FULL_VALIDATION } from "../common/validation.js";
import { parseCompoundRef, type Compound } from "../compound/index.js";
import { MibigEntry } from "../entry/entry.js";
import type { Locus, Taxonomy } from "../entry/locus.js";
import type { LegacyCluster, LegacyCompound, LegacyDocument, LegacyLoci } from "../legacy/model.js";
import type { Logger } from "../logging/logger.js";
import { convertChangelog } from "./changelog.js";
import { convertBiosynthesis } from "./classes.js";
import { convertGenes, convertOperons } from "./genes.js";

export interface ConvertOptions {
  readonly logger: Logger;
}

const LEGACY_COMPLETENESS: Readonly<Record<string, CompletenessLevel>> = {
  complete: "complete",
  incomplete: "partial",
  Unknown: "unknown",
};

// ═══════════════════════════════════════════════════════════════════════════
// PARTS
// ═══════════════════════════════════════════════════════════════════════════

export function convertCompleteness(legacy: string): CompletenessLevel {
  const completeness = LEGACY_COMPLETENESS[legacy];
  if (completeness === undefined) {
    throw new MigrationError(`Unknown completeness: ${legacy}`, legacy);
  }
  return completeness;
}

function convertStatus(legacy: string | undefined): StatusLevel {
  const status = StatusLevel.safeParse(legacy ?? "active");
  if (!status.success) {
    throw new MigrationError(`Unknown status: ${legacy}`, legacy);
  }
  return status.data;
}

export function convertLocus(legacy: LegacyLoci): Locus {
  return {
    accession: legacy.accession,
    location: { begin: legacy.start_coord ?? 0, end: legacy.end_coord ?? 0 },
    evidence: (legacy.evidence ?? []).map((method) => ({ method, references: [] })),
  };
}

/**
 * @throws MigrationError unless the tax id is a whole number
 */
export function convertTaxonomy(cluster: LegacyCluster): Taxonomy {
  const raw = cluster.ncbi_tax_id;
  const ncbiTaxId = typeof raw === "number" ? raw : /^\d+$/.test(raw.trim()) ? Number(raw) : Number.NaN;
  if (!Number.isInteger(ncbiTaxId)) {
    throw new MigrationError(`Invalid NCBI tax id: ${raw}`, String(raw));
  }
  return { name: cluster.organism_name, ncbiTaxId };
}

export function convertCompound(legacy: LegacyCompound): Compound {
  return compact<Compound>({
    name: legacy.compound,
    evidence: [],
    classes: [],
    bioactivities: [],
    synonyms: [],
    databases: (legacy.database_id ?? []).map(parseCompoundRef),
    moieties: [],
    mass: legacy.mol_mass,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Migrate a parsed legacy document. The result is built at the
 * "questionable" tier and fully validated before it is returned.
 *
 * @throws MigrationError for legacy content with no v4 counterpart
 * @throws ValidationError when the migrated entry breaks an invariant
 */
export function convertLegacyEntry(doc: LegacyDocument, options: ConvertOptions): MibigEntry {
  const { logger } = options;
  const cluster = doc.cluster;
  logger.info("Converting legacy entry", { accession: cluster.mibig_accession });

  if (!cluster.loci) {
    throw new MigrationError(`Entry ${cluster.mibig_accession} has no loci`, cluster.mibig_accession);
  }
  const changelog = convertChangelog(doc.changelog);
  const status = convertStatus(cluster.status);
  const biosynthesis = convertBiosynthesis(cluster, logger);

  const entry = compact<MibigEntry>({
    accession: cluster.mibig_accession,
    version: changelog.releases.length + 1,
    changelog,
    quality: "questionable",
    status,
    completeness: convertCompleteness(cluster.loci.completeness),
    loci: [convertLocus(cluster.loci)],
    biosynthesis: { ...biosynthesis, operons: [...biosynthesis.operons, ...convertOperons(cluster.genes)] },
    compounds: cluster.compounds.map(convertCompound),
    taxonomy: convertTaxonomy(cluster),
    genes: convertGenes(cluster.genes),
    retirementReasons: status === "retired" ? cluster.retirement_reasons ?? [] : [],
    seeAlso: cluster.see_also ?? [],
    comment: doc.comments,
  });

  const created = MibigEntry.create(entry, FULL_VALIDATION);
  logger.debug("Converted legacy entry", {
    accession: created.accession,
    classes: created.biosynthesis.classes.length,
    modules: created.biosynthesis.modules.length,
  });
  return created;
}
