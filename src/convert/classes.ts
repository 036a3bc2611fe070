/**
 * Biosynthetic class migration.
 *
 * Legacy class names map onto the closed set of synthesis types. Each class
 * takes its payload from the matching legacy block; NRPS and PKS blocks also
 * contribute modules.
 */

import { MigrationError } from "../common/errors.js";
import { compact } from "../common/validation.js";
import {
  RippType,
  TerpenePrecursor,
  UNMIGRATED_GT_SPECIFICITY,
  biosynthesisClass,
  otherClassInfo,
  type BiosynthesisClass,
  type Crosslink,
  type OtherClassInfo,
  type Precursor,
  type RibosomalClassInfo,
  type SaccharideClassInfo,
  type SynthesisType,
  type TerpeneClassInfo,
} from "../biosynthesis/classes/index.js";
import type { Biosynthesis } from "../biosynthesis/biosynthesis.js";
import type { Module } from "../biosynthesis/modules/index.js";
import {
  describeLegacyClass,
  type LegacyCluster,
  type LegacyPrecursorGene,
  type LegacyRipp,
  type LegacySaccharide,
  type LegacyTerpene,
} from "../legacy/model.js";
import type { Logger } from "../logging/logger.js";
import { convertEvidence } from "./evidence.js";
import { convertNrpsClass, convertNrpsModules } from "./nrps.js";
import { convertPks } from "./pks.js";

export const LEGACY_CLASS_MAPPING: Readonly<Record<string, SynthesisType>> = {
  NRP: "NRPS",
  Polyketide: "PKS",
  RiPP: "ribosomal",
  Saccharide: "saccharide",
  Terpene: "TERPENE",
  Other: "OTHER",
};

export const ALKALOID_DETAILS = "converted from 'Alkaloid'";
export const UNDETAILED_OTHER = "converted from v3 without extra details";

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOADS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Payload of the OTHER class: the legacy "other" block wins, then the
 * details of a folded-in Alkaloid class, then the placeholder.
 */
export function convertOther(cluster: LegacyCluster, alkaloid: boolean): OtherClassInfo {
  const subclass = cluster.other?.subclass;
  if (subclass !== undefined) {
    const lowered = subclass.toLowerCase();
    return lowered === "unknown" || lowered === "other"
      ? otherClassInfo("other", UNDETAILED_OTHER)
      : otherClassInfo(lowered);
  }
  return otherClassInfo("other", alkaloid ? ALKALOID_DETAILS : UNDETAILED_OTHER);
}

export function convertSaccharide(legacy: LegacySaccharide | undefined): SaccharideClassInfo {
  return compact<SaccharideClassInfo>({
    kind: "saccharide",
    subclass: legacy?.subclass,
    glycosyltransferases: (legacy?.glycosyltransferases ?? []).map((gt) => ({
      gene: gt.gene_id,
      evidence: convertEvidence(gt.evidence),
      // TODO: derive the specificity structure from the legacy sugar name
      specificity: UNMIGRATED_GT_SPECIFICITY,
    })),
    subclusters: (legacy?.sugar_subclusters ?? []).map((genes) => ({ genes: [...genes], references: [] })),
  });
}

export function convertTerpene(legacy: LegacyTerpene | undefined): TerpeneClassInfo {
  if (!legacy) {
    return { kind: "TERPENE", subclass: "Unknown", prenyltransferases: [], synthases: [] };
  }
  const precursor = TerpenePrecursor.safeParse(legacy.terpene_precursor);
  return compact<TerpeneClassInfo>({
    kind: "TERPENE",
    subclass: legacy.carbon_count_subclass ?? "Unknown",
    prenyltransferases: legacy.prenyltransferases ?? [],
    synthases: legacy.terpene_synth_cycl ?? [],
    precursor: precursor.success ? precursor.data : undefined,
  });
}

function convertPrecursor(legacy: LegacyPrecursorGene): Precursor {
  const crosslinks = (legacy.crosslinks ?? []).map((crosslink): Crosslink => {
    if (crosslink.first_AA === undefined || crosslink.second_AA === undefined) {
      throw new MigrationError(`Crosslink of precursor ${legacy.gene_id} has no positions`, legacy.gene_id);
    }
    return { begin: crosslink.first_AA, end: crosslink.second_AA, linkType: crosslink.crosslink_type };
  });
  const leader = legacy.leader_sequence;
  return compact<Precursor>({
    gene: legacy.gene_id,
    coreSequence: legacy.core_sequence.join(""),
    crosslinks,
    // approximated from the leader length; the legacy format has no site
    leaderCleavageLocation: leader ? { begin: leader.length - 1, end: leader.length } : undefined,
    recognitionMotif: legacy.recognition_motif,
  });
}

/**
 * Payload of the ribosomal class. A legacy subclass naming a RiPP type
 * gives a RiPP of that type; any other subclass gives an unmodified peptide.
 */
export function convertRibosomal(legacy: LegacyRipp | undefined): RibosomalClassInfo {
  if (!legacy) {
    return { kind: "ribosomal", subclass: "RiPP", precursors: [], peptidases: [] };
  }
  const rippType = RippType.safeParse(legacy.subclass);
  return compact<RibosomalClassInfo>({
    kind: "ribosomal",
    subclass: rippType.success ? "RiPP" : "unmodified",
    rippType: rippType.success ? rippType.data : undefined,
    precursors: (legacy.precursor_genes ?? []).map(convertPrecursor),
    peptidases: legacy.peptidases ?? [],
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Classes and modules of a legacy cluster, in the order of its class list.
 * Operons and paths are left empty.
 *
 * @throws MigrationError for class names outside the mapping
 */
export function convertBiosynthesis(cluster: LegacyCluster, logger: Logger): Biosynthesis {
  const classes: BiosynthesisClass[] = [];
  const modules: Module[] = [];
  for (const name of cluster.biosyn_class) {
    logger.debug("Converting biosynthetic class", { class: describeLegacyClass(cluster, name) });
    const alkaloid = name === "Alkaloid";
    const type = alkaloid ? "OTHER" : LEGACY_CLASS_MAPPING[name];
    switch (type) {
      case "NRPS":
        if (cluster.nrp) {
          modules.push(...convertNrpsModules(cluster.nrp, logger));
        }
        classes.push(biosynthesisClass(convertNrpsClass(cluster.nrp)));
        break;
      case "PKS": {
        const pks = convertPks(cluster.polyketide);
        modules.push(...pks.modules);
        classes.push(biosynthesisClass(pks.info));
        break;
      }
      case "ribosomal":
        classes.push(biosynthesisClass(convertRibosomal(cluster.ripp)));
        break;
      case "saccharide":
        classes.push(biosynthesisClass(convertSaccharide(cluster.saccharide)));
        break;
      case "TERPENE":
        classes.push(biosynthesisClass(convertTerpene(cluster.terpene)));
        break;
      case "OTHER":
        classes.push(biosynthesisClass(convertOther(cluster, alkaloid)));
        break;
      default:
        throw new MigrationError(`Unknown biosynthetic class: ${name}`, name);
    }
  }
  return { classes, modules, operons: [], paths: [] };
}
