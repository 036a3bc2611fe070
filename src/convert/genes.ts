/**
 * Gene annotation and operon migration.
 */

import { parseCitation } from "../common/citation.js";
import { MigrationError } from "../common/errors.js";
import { compact } from "../common/validation.js";
import { adenylationSubstrate, isProteinogenic, type Domain } from "../biosynthesis/domains/index.js";
import type { Operon } from "../biosynthesis/operon.js";
import type { Addition, Annotation, Genes } from "../genes/genes.js";
import type { LegacyAnnotation, LegacyExtraGene, LegacyGeneDomain, LegacyGenes } from "../legacy/model.js";
import { convertEvidence } from "./evidence.js";

/**
 * Convert a legacy gene domain. Only adenylation domains carry enough
 * detail in the legacy format to be carried over.
 *
 * @throws MigrationError for any other domain
 */
export function convertGeneDomain(legacy: LegacyGeneDomain, gene: string): Domain {
  const type = legacy.name.toLowerCase();
  if (type === "adenylation" || type === "amp-binding") {
    const substrates = legacy.substrates ?? [];
    return {
      type,
      gene,
      location: { begin: legacy.location.begin, end: legacy.location.end },
      info: {
        kind: "adenylation",
        substrates: substrates.map((substrate) =>
          adenylationSubstrate(substrate.name, isProteinogenic(substrate.name), substrate.structure)
        ),
        evidence: substrates.flatMap((substrate) =>
          convertEvidence(substrate.evidence, (substrate.publications ?? []).map(parseCitation))
        ),
        precursorBiosynthesis: [],
      },
    };
  }
  throw new MigrationError(`Domain conversion for ${legacy.name} not implemented`, legacy.name);
}

function convertAddition(legacy: LegacyExtraGene): Addition {
  if (!legacy.location) {
    throw new MigrationError(`Extra gene ${legacy.id} has no location`, legacy.id);
  }
  return compact<Addition>({
    id: legacy.id,
    location: {
      exons: legacy.location.exons.map((exon) => ({ begin: exon.start, end: exon.end })),
      strand: legacy.location.strand,
    },
    translation: legacy.translation,
  });
}

/**
 * Convert a legacy annotation. A name holding "/" lists the gene name
 * first and its aliases after it.
 */
export function convertAnnotation(legacy: LegacyAnnotation): Annotation {
  const [name, ...aliases] = legacy.name ? legacy.name.split("/") : [];
  return compact<Annotation>({
    id: legacy.id,
    name,
    aliases,
    product: legacy.product,
    functions: [],
    tailoringFunctions: [],
    domains: (legacy.domains ?? []).map((domain) => convertGeneDomain(domain, legacy.id)),
  });
}

export function convertOperons(legacy: LegacyGenes | undefined): Operon[] {
  return (legacy?.operons ?? []).map((operon) => ({
    genes: [...operon.genes],
    evidence: convertEvidence(operon.evidence),
  }));
}

/**
 * Additions and annotations of a legacy gene block; undefined when the
 * document has none.
 */
export function convertGenes(legacy: LegacyGenes | undefined): Genes | undefined {
  if (!legacy) {
    return undefined;
  }
  return {
    toAdd: (legacy.extra_genes ?? []).map(convertAddition),
    toDelete: [],
    annotations: (legacy.annotations ?? []).map(convertAnnotation),
  };
}
