/**
 * Assembly-line modules.
 *
 * Every module groups catalytic domains into core slots, fixed per module
 * type, plus optional carrier and modification domains. As with domains,
 * the type tag picks the payload and the payload is flattened on the wire.
 */

import { z } from "zod";
import type { ValidationIssue } from "../../common/errors.js";
import { GeneId, GeneIdList } from "../../common/primitives.js";
import {
  compact,
  entity,
  Issues,
  nonEmpty,
  type ValidationContext,
} from "../../common/validation.js";
import type { Citation } from "../../common/citation.js";
import { Domain, DomainWire } from "../domains/domain.js";
import { domainReferences } from "../domains/payloads.js";
import type { DomainType } from "../domains/types.js";
import { Monomer, MonomerWire } from "../monomer.js";
import { NonCanonicalActivity, NonCanonicalActivityWire } from "./activity.js";

export const ModuleType = z.enum([
  "cal",
  "nrps-type1",
  "nrps-type6",
  "other",
  "pks-iterative",
  "pks-modular",
  "pks-modular-starter",
  "pks-trans-at",
  "pks-trans-at-starter",
]);
export type ModuleType = z.infer<typeof ModuleType>;

// ═══════════════════════════════════════════════════════════════════════════
// PAYLOADS
// ═══════════════════════════════════════════════════════════════════════════

/** Optional domains every assembly-line module may carry */
export interface AssemblyLine {
  readonly carriers: readonly Domain[];
  readonly modificationDomains: readonly Domain[];
}

export interface NrpsModuleInfo extends AssemblyLine {
  readonly kind: "nrps";
  readonly aDomain: Domain;
  readonly cDomain?: Domain;
}

export interface PksModularInfo extends AssemblyLine {
  readonly kind: "pks-modular";
  readonly atDomain: Domain;
  readonly ksDomain: Domain;
}

export interface PksModularStarterInfo extends AssemblyLine {
  readonly kind: "pks-modular-starter";
  readonly atDomain: Domain;
}

export interface PksTransAtInfo extends AssemblyLine {
  readonly kind: "pks-trans-at";
  readonly ksDomain: Domain;
}

export interface PksTransAtStarterInfo extends AssemblyLine {
  readonly kind: "pks-trans-at-starter";
}

export interface PksIterativeInfo extends AssemblyLine {
  readonly kind: "pks-iterative";
  readonly atDomain: Domain;
  readonly ksDomain: Domain;
  readonly iterations: number;
}

export interface CalModuleInfo extends AssemblyLine {
  readonly kind: "cal";
  readonly calDomain: Domain;
}

export interface OtherModuleInfo {
  readonly kind: "other";
  readonly subtype: string;
}

export type ModuleInfo =
  | NrpsModuleInfo
  | PksModularInfo
  | PksModularStarterInfo
  | PksTransAtInfo
  | PksTransAtStarterInfo
  | PksIterativeInfo
  | CalModuleInfo
  | OtherModuleInfo;

export type ModuleInfoKind = ModuleInfo["kind"];

export const MODULE_PAYLOAD_KIND = {
  cal: "cal",
  "nrps-type1": "nrps",
  "nrps-type6": "nrps",
  other: "other",
  "pks-iterative": "pks-iterative",
  "pks-modular": "pks-modular",
  "pks-modular-starter": "pks-modular-starter",
  "pks-trans-at": "pks-trans-at",
  "pks-trans-at-starter": "pks-trans-at-starter",
} as const satisfies Record<ModuleType, ModuleInfoKind>;

export type ModuleInfoOf<T extends ModuleType> = Extract<
  ModuleInfo,
  { kind: (typeof MODULE_PAYLOAD_KIND)[T] }
>;

export interface ModuleOf<T extends ModuleType> {
  readonly type: T;
  readonly name: string;
  readonly genes: readonly GeneId[];
  readonly active: boolean;
  readonly info: ModuleInfoOf<T>;
  readonly integratedMonomers: readonly Monomer[];
  readonly comment?: string;
  readonly nonCanonicalActivity?: NonCanonicalActivity;
}

export type Module = { [T in ModuleType]: ModuleOf<T> }[ModuleType];

// ═══════════════════════════════════════════════════════════════════════════
// WIRE
// ═══════════════════════════════════════════════════════════════════════════

const HEADER = {
  name: z.string(),
  genes: GeneIdList,
  active: z.boolean(),
  integrated_monomers: z.array(MonomerWire).optional(),
  comment: z.string().optional(),
  non_canonical_activity: NonCanonicalActivityWire.optional(),
};

const ASSEMBLY_LINE = {
  carriers: z.array(DomainWire),
  modification_domains: z.array(DomainWire).optional(),
};

const NrpsWire = z.object({ ...ASSEMBLY_LINE, a_domain: DomainWire, c_domain: DomainWire.optional() });

export const ModuleWire = z.discriminatedUnion("type", [
  z.object({ type: z.literal("cal"), ...HEADER, ...ASSEMBLY_LINE, cal: DomainWire }),
  NrpsWire.extend({ type: z.literal("nrps-type1"), ...HEADER }),
  NrpsWire.extend({ type: z.literal("nrps-type6"), ...HEADER }),
  z.object({ type: z.literal("other"), ...HEADER, subtype: z.string() }),
  z.object({
    type: z.literal("pks-iterative"),
    ...HEADER,
    ...ASSEMBLY_LINE,
    at_domain: DomainWire,
    ks_domain: DomainWire,
    iterations: z.number().int(),
  }),
  z.object({
    type: z.literal("pks-modular"),
    ...HEADER,
    ...ASSEMBLY_LINE,
    at_domain: DomainWire,
    ks_domain: DomainWire,
  }),
  z.object({ type: z.literal("pks-modular-starter"), ...HEADER, ...ASSEMBLY_LINE, at_domain: DomainWire }),
  z.object({ type: z.literal("pks-trans-at"), ...HEADER, ...ASSEMBLY_LINE, ks_domain: DomainWire }),
  z.object({ type: z.literal("pks-trans-at-starter"), ...HEADER, ...ASSEMBLY_LINE }),
]);
export type ModuleWire = z.infer<typeof ModuleWire>;

type AssemblyLineWire = {
  carriers: DomainWire[];
  modification_domains?: DomainWire[];
};

function readAssemblyLine(raw: AssemblyLineWire): AssemblyLine {
  return {
    carriers: raw.carriers.map(Domain.read),
    modificationDomains: (raw.modification_domains ?? []).map(Domain.read),
  };
}

function encodeAssemblyLine(info: AssemblyLine): AssemblyLineWire {
  return compact({
    carriers: info.carriers.map(Domain.encode),
    modification_domains: nonEmpty(info.modificationDomains.map(Domain.encode)),
  });
}

type WireOf<T extends ModuleType> = Extract<ModuleWire, { type: T }>;

function readHeader(raw: ModuleWire) {
  return compact({
    name: raw.name,
    genes: raw.genes,
    active: raw.active,
    integratedMonomers: (raw.integrated_monomers ?? []).map(Monomer.read),
    comment: raw.comment,
    nonCanonicalActivity: raw.non_canonical_activity
      ? NonCanonicalActivity.read(raw.non_canonical_activity)
      : undefined,
  });
}

function readNrps(raw: WireOf<"nrps-type1" | "nrps-type6">): NrpsModuleInfo {
  return compact<NrpsModuleInfo>({
    kind: "nrps",
    ...readAssemblyLine(raw),
    aDomain: Domain.read(raw.a_domain),
    cDomain: raw.c_domain ? Domain.read(raw.c_domain) : undefined,
  });
}

function readModule(raw: ModuleWire): Module {
  const header = readHeader(raw);
  switch (raw.type) {
    case "cal":
      return {
        type: raw.type,
        ...header,
        info: { kind: "cal", ...readAssemblyLine(raw), calDomain: Domain.read(raw.cal) },
      };
    case "nrps-type1":
    case "nrps-type6":
      return { type: raw.type, ...header, info: readNrps(raw) };
    case "other":
      return { type: raw.type, ...header, info: { kind: "other", subtype: raw.subtype } };
    case "pks-iterative":
      return {
        type: raw.type,
        ...header,
        info: {
          kind: "pks-iterative",
          ...readAssemblyLine(raw),
          atDomain: Domain.read(raw.at_domain),
          ksDomain: Domain.read(raw.ks_domain),
          iterations: raw.iterations,
        },
      };
    case "pks-modular":
      return {
        type: raw.type,
        ...header,
        info: {
          kind: "pks-modular",
          ...readAssemblyLine(raw),
          atDomain: Domain.read(raw.at_domain),
          ksDomain: Domain.read(raw.ks_domain),
        },
      };
    case "pks-modular-starter":
      return {
        type: raw.type,
        ...header,
        info: { kind: "pks-modular-starter", ...readAssemblyLine(raw), atDomain: Domain.read(raw.at_domain) },
      };
    case "pks-trans-at":
      return {
        type: raw.type,
        ...header,
        info: { kind: "pks-trans-at", ...readAssemblyLine(raw), ksDomain: Domain.read(raw.ks_domain) },
      };
    case "pks-trans-at-starter":
      return { type: raw.type, ...header, info: { kind: "pks-trans-at-starter", ...readAssemblyLine(raw) } };
  }
}

function encodeModule(module: Module): ModuleWire {
  const header = compact({
    name: module.name,
    genes: [...module.genes],
    active: module.active,
    integrated_monomers: nonEmpty(module.integratedMonomers.map(Monomer.encode)),
    comment: module.comment || undefined,
    non_canonical_activity: module.nonCanonicalActivity
      ? NonCanonicalActivity.encode(module.nonCanonicalActivity)
      : undefined,
  });
  switch (module.type) {
    case "cal": {
      const info = module.info;
      return { type: module.type, ...header, ...encodeAssemblyLine(info), cal: Domain.encode(info.calDomain) };
    }
    case "nrps-type1":
    case "nrps-type6": {
      const info = module.info;
      return compact({
        type: module.type,
        ...header,
        ...encodeAssemblyLine(info),
        a_domain: Domain.encode(info.aDomain),
        c_domain: info.cDomain ? Domain.encode(info.cDomain) : undefined,
      });
    }
    case "other":
      return { type: module.type, ...header, subtype: module.info.subtype };
    case "pks-iterative": {
      const info = module.info;
      return {
        type: module.type,
        ...header,
        ...encodeAssemblyLine(info),
        at_domain: Domain.encode(info.atDomain),
        ks_domain: Domain.encode(info.ksDomain),
        iterations: info.iterations,
      };
    }
    case "pks-modular": {
      const info = module.info;
      return {
        type: module.type,
        ...header,
        ...encodeAssemblyLine(info),
        at_domain: Domain.encode(info.atDomain),
        ks_domain: Domain.encode(info.ksDomain),
      };
    }
    case "pks-modular-starter":
      return {
        type: module.type,
        ...header,
        ...encodeAssemblyLine(module.info),
        at_domain: Domain.encode(module.info.atDomain),
      };
    case "pks-trans-at":
      return {
        type: module.type,
        ...header,
        ...encodeAssemblyLine(module.info),
        ks_domain: Domain.encode(module.info.ksDomain),
      };
    case "pks-trans-at-starter":
      return { type: module.type, ...header, ...encodeAssemblyLine(module.info) };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

interface Slot {
  readonly field: string;
  readonly domain: Domain;
  readonly accepts: readonly DomainType[];
}

/**
 * Core domains of a payload, each with the domain types its slot accepts.
 */
function coreSlots(info: Exclude<ModuleInfo, OtherModuleInfo>): Slot[] {
  const at = (domain: Domain): Slot => ({ field: "at_domain", domain, accepts: ["acyltransferase"] });
  const ks = (domain: Domain): Slot => ({ field: "ks_domain", domain, accepts: ["ketosynthase"] });
  switch (info.kind) {
    case "cal":
      return [{ field: "cal", domain: info.calDomain, accepts: ["ligase"] }];
    case "nrps": {
      const slots: Slot[] = [];
      if (info.cDomain) {
        slots.push({ field: "c_domain", domain: info.cDomain, accepts: ["condensation"] });
      }
      slots.push({ field: "a_domain", domain: info.aDomain, accepts: ["adenylation", "amp-binding"] });
      return slots;
    }
    case "pks-iterative":
    case "pks-modular":
      return [at(info.atDomain), ks(info.ksDomain)];
    case "pks-modular-starter":
      return [at(info.atDomain)];
    case "pks-trans-at":
      return [ks(info.ksDomain)];
    case "pks-trans-at-starter":
      return [];
  }
}

/**
 * Every domain a module holds: core first, then modification, then carriers.
 */
export function moduleDomains(module: Module): Domain[] {
  const info = module.info;
  if (info.kind === "other") {
    return [];
  }
  return [
    ...coreSlots(info).map((slot) => slot.domain),
    ...info.modificationDomains,
    ...info.carriers,
  ];
}

function validateModuleInfo(info: ModuleInfo, ctx: ValidationContext): ValidationIssue[] {
  const issues = new Issues();
  if (info.kind === "other") {
    issues.check(Boolean(info.subtype), "subtype", "Missing subtype");
    return issues.list();
  }
  const slots = coreSlots(info);
  if (slots.length + info.modificationDomains.length + info.carriers.length === 0) {
    issues.add("", "Modules require at least one domain");
  }
  for (const slot of slots) {
    issues.check(
      slot.accepts.includes(slot.domain.type),
      slot.field,
      `Expected a ${slot.accepts.join(" or ")} domain, got '${slot.domain.type}'`
    );
    issues.nested(slot.field, Domain.validate(slot.domain, ctx));
  }
  info.carriers.forEach((carrier, index) => {
    issues.check(
      carrier.type === "carrier",
      `carriers[${index}]`,
      `Expected a carrier domain, got '${carrier.type}'`
    );
  });
  issues.each("carriers", info.carriers, (domain) => Domain.validate(domain, ctx));
  issues.each("modification_domains", info.modificationDomains, (domain) => Domain.validate(domain, ctx));
  if (info.kind === "pks-iterative") {
    issues.check(info.iterations >= 1, "iterations", "Must be greater than 0");
  }
  return issues.list();
}

export const Module = entity<Module, ModuleWire>({
  name: "module",
  wire: ModuleWire,
  read: readModule,
  encode: encodeModule,
  validate: (module, ctx) => {
    const issues = new Issues();
    issues.check(
      MODULE_PAYLOAD_KIND[module.type] === module.info.kind,
      "type",
      `Payload '${module.info.kind}' does not match module type '${module.type}'`
    );
    issues.check(Boolean(module.name), "name", "Module name must not be empty");
    issues.each("genes", module.genes, (gene) => GeneId.validate(gene, ctx));
    issues.nested("", validateModuleInfo(module.info, ctx));
    issues.each("integrated_monomers", module.integratedMonomers, (monomer) =>
      Monomer.validate(monomer, ctx)
    );
    if (module.nonCanonicalActivity) {
      issues.nested("non_canonical_activity", NonCanonicalActivity.validate(module.nonCanonicalActivity, ctx));
    }
    return issues.list();
  },
});

/**
 * Citations of every domain and integrated monomer of a module.
 */
export function moduleReferences(module: Module): Citation[] {
  return [
    ...moduleDomains(module).flatMap((domain) => domainReferences(domain.info)),
    ...module.integratedMonomers.flatMap((monomer) => monomer.references),
  ];
}

/**
 * A copy of a module that also lists `gene`, for modules spanning several
 * coding sequences. A gene the module already lists is not added again, so
 * `genes` never holds duplicates.
 */
export function withGene(module: Module, gene: GeneId): Module {
  if (module.genes.includes(gene)) {
    return module;
  }
  return { ...module, genes: [...module.genes, gene] };
}
