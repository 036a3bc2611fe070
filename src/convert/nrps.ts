/**
 * NRPS class and module migration.
 */

import { parseCitation } from "../common/citation.js";
import { MigrationError } from "../common/errors.js";
import type { GeneId, Location } from "../common/primitives.js";
import { compact } from "../common/validation.js";
import type { NrpsClassInfo, ReleaseType } from "../biosynthesis/classes/index.js";
import {
  activeInfo,
  adenylationSubstrate,
  type AdenylationSubstrate,
  type CondensationInfo,
  type Domain,
  type MethyltransferaseInfo,
  type ThioesteraseInfo,
} from "../biosynthesis/domains/index.js";
import {
  NO_ITERATIONS,
  UNKNOWN_ITERATIONS,
  withGene,
  type Module,
  type NonCanonicalActivity,
  type NrpsModuleInfo,
} from "../biosynthesis/modules/index.js";
import type { LegacyNonCanonical, LegacyNrp, LegacyNrpsModule, LegacySpecificity } from "../legacy/model.js";
import type { Logger } from "../logging/logger.js";
import { convertEvidence } from "./evidence.js";

/** Legacy domains carry no coordinates */
export function unplaced(): Location {
  return { begin: -1, end: -1 };
}

/**
 * Non-canonical activity of a legacy module; "iterated" becomes an
 * unspecified iteration count.
 */
export function convertNonCanonical(legacy: LegacyNonCanonical | undefined): NonCanonicalActivity | undefined {
  if (!legacy) {
    return undefined;
  }
  return compact<NonCanonicalActivity>({
    evidence: convertEvidence(legacy.evidence),
    iterations: legacy.iterated ? UNKNOWN_ITERATIONS : NO_ITERATIONS,
    nonElongating: legacy.non_elongating,
    skipped: legacy.skipped,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SUBSTRATES
// ═══════════════════════════════════════════════════════════════════════════

/** Legacy amino acid names that differ from the current vocabulary */
const LEGACY_AMINO_ACIDS: Readonly<Record<string, string>> = {
  Aspartate: "aspartic acid",
  Glutamate: "glutamic acid",
};

function specificitySubstrates(specificity: LegacySpecificity): AdenylationSubstrate[] {
  return [
    ...(specificity.proteinogenic ?? []).map((name) =>
      adenylationSubstrate(LEGACY_AMINO_ACIDS[name] ?? name.toLowerCase(), true)
    ),
    ...(specificity.nonproteinogenic ?? []).map((name) => adenylationSubstrate(name, false)),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// MODIFICATION DOMAINS
// ═══════════════════════════════════════════════════════════════════════════

interface ModificationDomains {
  readonly carriers: Domain[];
  readonly modifications: Domain[];
}

function modificationDomains(names: readonly string[], gene: GeneId): ModificationDomains {
  const carriers: Domain[] = [];
  const modifications: Domain[] = [];
  for (const name of names) {
    if (name === "Methylation" || name.endsWith("-methylation")) {
      const subtype = name.endsWith("-methylation") ? name.split("-")[0] : undefined;
      modifications.push({
        type: "methyltransferase",
        gene,
        location: unplaced(),
        info: compact<MethyltransferaseInfo>({ kind: "methyltransferase", subtype }),
      });
    } else if (name === "Phosphopantetheinyl transferase" || name === "Beta-branching") {
      carriers.push({
        type: "carrier",
        gene,
        location: unplaced(),
        info: {
          kind: "carrier",
          subtype: "PCP",
          betaBranching: name === "Beta-branching",
          references: [],
          evidence: [],
        },
      });
    } else if (name === "Hydroxylation" || name === "beta-hydroxylation") {
      modifications.push({ type: "hydroxylase", gene, location: unplaced(), info: activeInfo() });
    } else if (name === "CoA-ligase") {
      modifications.push({
        type: "ligase",
        gene,
        location: unplaced(),
        info: { kind: "ligase", substrates: [], evidence: [] },
      });
    } else if (name === "Oxidation") {
      modifications.push({ type: "oxidase", gene, location: unplaced(), info: activeInfo() });
    } else if (name !== "Epimerization" && name !== "Unknown") {
      // epimerization is carried by the specificity
      throw new MigrationError(`Unsupported NRPS modification domain ${name}`, name);
    }
  }
  return { carriers, modifications };
}

// ═══════════════════════════════════════════════════════════════════════════
// MODULES
// ═══════════════════════════════════════════════════════════════════════════

function convertModule(
  legacy: LegacyNrpsModule,
  name: string,
  gene: GeneId,
  specificity: LegacySpecificity
): Module {
  const { carriers, modifications } = modificationDomains(legacy.modification_domains ?? [], gene);
  if (specificity.epimerized) {
    modifications.unshift({ type: "epimerase", gene, location: unplaced(), info: activeInfo(true) });
  }

  const evidence = convertEvidence(specificity.evidence);
  const publications = specificity.publications ?? [];
  const aEvidence =
    evidence.length === 1 && publications.length > 0
      ? evidence.map((item) => ({ ...item, references: publications.map(parseCitation) }))
      : evidence;

  const cDomain: Domain | undefined = legacy.c_dom_subtype
    ? {
        type: "condensation",
        gene,
        location: unplaced(),
        info: compact<CondensationInfo>({
          kind: "condensation",
          subtype: legacy.c_dom_subtype === "Unknown" ? undefined : legacy.c_dom_subtype,
          references: [],
          evidence: [],
        }),
      }
    : undefined;

  return compact<Module>({
    type: "nrps-type1",
    name,
    genes: [gene],
    active: legacy.active ?? true,
    integratedMonomers: [],
    nonCanonicalActivity: convertNonCanonical(legacy.non_canonical),
    info: compact<NrpsModuleInfo>({
      kind: "nrps",
      carriers,
      modificationDomains: modifications,
      aDomain: {
        type: "adenylation",
        gene,
        location: unplaced(),
        info: {
          kind: "adenylation",
          substrates: specificitySubstrates(specificity),
          evidence: aEvidence,
          precursorBiosynthesis: [],
        },
      },
      cDomain,
    }),
  });
}

/**
 * Modules of every NRPS gene, in order. A module number seen on an earlier
 * gene extends that module with the current gene; modules without a
 * number get "Unk01", "Unk02", ... in order of appearance.
 */
export function convertNrpsModules(legacy: LegacyNrp, logger: Logger): Module[] {
  const byName = new Map<string, Module>();
  let unnamed = 1;
  for (const nrpsGene of legacy.nrps_genes ?? []) {
    const gene = nrpsGene.gene_id;
    for (const legacyModule of nrpsGene.modules ?? []) {
      let name = legacyModule.module_number;
      if (!name) {
        name = `Unk${String(unnamed).padStart(2, "0")}`;
        unnamed += 1;
      }
      const seen = byName.get(name);
      if (seen) {
        byName.set(name, withGene(seen, gene));
        continue;
      }
      const specificity = legacyModule.a_substr_spec;
      if (!specificity) {
        logger.warn(`Missing specificity for NRPS module ${name}, skipping it`, { gene });
        continue;
      }
      byName.set(name, convertModule(legacyModule, name, gene, specificity));
    }
  }
  return [...byName.values()];
}

// ═══════════════════════════════════════════════════════════════════════════
// CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * NRPS class payload. Legacy NRPSs are taken as Type I.
 */
export function convertNrpsClass(legacy: LegacyNrp | undefined): NrpsClassInfo {
  const releaseTypes: ReleaseType[] = (legacy?.release_type ?? [])
    .filter((name) => name !== "Unknown" && name !== "Other")
    .map((name) => ({ name, references: [] }));
  const thioesterases: Domain[] = (legacy?.thioesterases ?? []).map((te): Domain => ({
    type: "thioesterase",
    gene: te.gene,
    location: unplaced(),
    info: compact<ThioesteraseInfo>({
      kind: "thioesterase",
      subtype: te.thioesterase_type === "Unknown" ? undefined : te.thioesterase_type,
    }),
  }));
  return { kind: "NRPS", subclass: "Type I", releaseTypes, thioesterases };
}
