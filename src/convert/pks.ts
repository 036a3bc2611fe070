/**
 * PKS class and module migration.
 *
 * Legacy PKS modules list their domains by free-text name. Acyltransferase
 * and ketosynthase fill the core slots and pick the module type; carrier-like
 * names become ACP carriers; every other name goes through a fixed table.
 */

import { MigrationError } from "../common/errors.js";
import type { GeneId } from "../common/primitives.js";
import { compact } from "../common/validation.js";
import type { PksClassInfo } from "../biosynthesis/classes/index.js";
import {
  ATSubstrateName,
  activeInfo,
  otherDomainInfo,
  type ATSubstrate,
  type Domain,
  type KetoreductaseInfo,
} from "../biosynthesis/domains/index.js";
import type { AssemblyLine, Module } from "../biosynthesis/modules/index.js";
import type { LegacyPksModule, LegacyPolyketide } from "../legacy/model.js";
import { convertEvidence } from "./evidence.js";
import { convertNonCanonical, unplaced } from "./nrps.js";

const CORE_DOMAINS = new Set(["Acyltransferase", "Ketosynthase"]);

const CARRIER_DOMAINS = new Set([
  "Thiolation (ACP/PCP)",
  "ACP transacylase",
  "Phosphopantetheinyl transferase",
  "Beta-branching",
]);

/** Legacy KR stereochemistry labels and their current names */
const KR_STEREOCHEMISTRY: Readonly<Record<string, string>> = {
  "L-OH": "A",
  "D-OH": "B",
};

/** Legacy names of domains that share the "other" payload */
const OTHER_DOMAIN_SUBTYPES: Readonly<Record<string, string>> = {
  Sulfotransferase: "Sulfotransferase",
  "Pyran synthase": "Pyran synthase",
  GNAT: "GNAT",
  "Enoyl-CoA dehydratase": "Enoyl-CoA dehydratase",
  "Crotonase / Enoyl-CoA dehydratase": "Enoyl-CoA dehydratase",
  FkbH: "FkbH",
  AFSA: "A-factor synthase A",
};

// ═══════════════════════════════════════════════════════════════════════════
// DOMAINS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Convert one non-core legacy PKS domain name.
 *
 * @throws MigrationError for names outside the table
 */
export function convertPksDomain(name: string, gene: GeneId, krStereochemistry?: string): Domain {
  const location = unplaced();
  switch (name) {
    case "Ketoreductase":
      return {
        type: "ketoreductase",
        gene,
        location,
        info: compact<KetoreductaseInfo>({
          kind: "ketoreductase",
          stereochemistry: krStereochemistry ? KR_STEREOCHEMISTRY[krStereochemistry] : undefined,
          evidence: [],
        }),
      };
    case "Dehydratase":
      return { type: "dehydratase", gene, location, info: activeInfo() };
    case "Enoylreductase":
      return { type: "enoylreductase", gene, location, info: activeInfo() };
    case "Thioesterase":
      return { type: "thioesterase", gene, location, info: { kind: "thioesterase" } };
    case "Thiol reductase":
      return { type: "thioreductase", gene, location, info: activeInfo() };
    case "Methylation":
    case "Methyltransferase":
    case "MT":
      return { type: "methyltransferase", gene, location, info: { kind: "methyltransferase" } };
    case "Product Template domain":
      return { type: "product_template", gene, location, info: activeInfo() };
    case "CoA-ligase":
      return { type: "ligase", gene, location, info: { kind: "ligase", substrates: [], evidence: [] } };
    case "Michael branching":
    case "B":
      return { type: "branching", gene, location, info: activeInfo() };
    case "Epimerization":
      return { type: "epimerase", gene, location, info: activeInfo() };
    case "Oxidase":
    case "Oxidation":
    case "OXY":
      return { type: "oxidase", gene, location, info: activeInfo() };
    case "Hydroxylation":
      return { type: "hydroxylase", gene, location, info: activeInfo() };
  }
  const subtype = OTHER_DOMAIN_SUBTYPES[name];
  if (subtype === undefined) {
    throw new MigrationError(`Unknown PKS domain type '${name}'`, name);
  }
  return { type: "other", gene, location, info: otherDomainInfo(subtype) };
}

/**
 * Acyltransferase substrate of a legacy specificity. The first letter is
 * lowercased; names outside the vocabulary become "other" with the text
 * kept as details.
 */
export function convertATSubstrate(specificity: string): ATSubstrate {
  const name = specificity.charAt(0).toLowerCase() + specificity.slice(1);
  return ATSubstrateName.safeParse(name).success ? { name } : { name: "other", details: name };
}

// ═══════════════════════════════════════════════════════════════════════════
// MODULES
// ═══════════════════════════════════════════════════════════════════════════

function convertModule(legacy: LegacyPksModule, gene: GeneId, name: string): Module {
  const domains = legacy.domains ?? [];

  const atDomain: Domain | undefined = domains.includes("Acyltransferase")
    ? {
        type: "acyltransferase",
        gene,
        location: unplaced(),
        info: {
          kind: "acyltransferase",
          substrates: (legacy.at_specificities ?? []).map(convertATSubstrate),
          evidence: convertEvidence(legacy.evidence ? [legacy.evidence] : []),
        },
      }
    : undefined;

  const ksDomain: Domain | undefined = domains.includes("Ketosynthase")
    ? { type: "ketosynthase", gene, location: unplaced(), info: activeInfo() }
    : undefined;

  const carriers: Domain[] = domains
    .filter((domain) => CARRIER_DOMAINS.has(domain))
    .map((domain): Domain => ({
      type: "carrier",
      gene,
      location: unplaced(),
      info: {
        kind: "carrier",
        subtype: "ACP",
        betaBranching: domain === "Beta-branching",
        references: [],
        evidence: [],
      },
    }));

  const modificationDomains = [...domains, ...(legacy.pks_mod_doms ?? [])]
    .map((domain) => domain.trim())
    .filter((domain) => !CORE_DOMAINS.has(domain) && !CARRIER_DOMAINS.has(domain))
    .map((domain) => convertPksDomain(domain, gene, legacy.kr_stereochem));

  const line: AssemblyLine = { carriers, modificationDomains };
  const header = {
    name,
    genes: legacy.genes ?? [],
    active: true,
    integratedMonomers: [],
    nonCanonicalActivity: convertNonCanonical(legacy.non_canonical),
  };

  if (atDomain && ksDomain) {
    return compact<Module>({ type: "pks-modular", ...header, info: { kind: "pks-modular", ...line, atDomain, ksDomain } });
  }
  if (atDomain) {
    return compact<Module>({
      type: "pks-modular-starter",
      ...header,
      info: { kind: "pks-modular-starter", ...line, atDomain },
    });
  }
  if (ksDomain) {
    return compact<Module>({ type: "pks-trans-at", ...header, info: { kind: "pks-trans-at", ...line, ksDomain } });
  }
  return compact<Module>({
    type: "pks-trans-at-starter",
    ...header,
    info: { kind: "pks-trans-at-starter", ...line },
  });
}

/**
 * Subclass of a synthase: the first entry mentioning a "type", from the
 * cluster level and then the synthase level.
 */
function pksSubclass(candidates: readonly string[], fallback: string): string {
  const subclass = candidates.find((candidate) => candidate.toLowerCase().includes("type")) ?? fallback;
  return subclass === "Modular type I" ? "Type I" : subclass;
}

export interface PksConversion {
  readonly info: PksClassInfo;
  readonly modules: Module[];
}

/**
 * PKS class payload and the modules of every synthase.
 *
 * @throws MigrationError for modules without genes or with unknown domains
 */
export function convertPks(legacy: LegacyPolyketide | undefined): PksConversion {
  let subclass = pksSubclass(legacy?.subclasses ?? [], "Unknown");
  const modules: Module[] = [];
  let unnamed = 1;
  for (const synthase of legacy?.synthases ?? []) {
    subclass = pksSubclass(synthase.subclass ?? [], subclass);
    for (const legacyModule of synthase.modules ?? []) {
      const gene = legacyModule.genes?.[0];
      if (gene === undefined) {
        throw new MigrationError(`PKS module ${legacyModule.module_number ?? "without a number"} lists no genes`);
      }
      let name = legacyModule.module_number;
      if (!name) {
        name = `Unk${String(unnamed).padStart(2, "0")}`;
        unnamed += 1;
      }
      modules.push(convertModule(legacyModule, gene, name));
    }
  }
  return { info: { kind: "PKS", subclass, cyclases: [] }, modules };
}
