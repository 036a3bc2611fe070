/**
 * The biosynthesis aggregate: classes, modules, operons and paths.
 */

import { z } from "zod";
import { uniqueCitations, type Citation } from "../common/citation.js";
import { evidenceReferences } from "../common/evidence.js";
import type { GeneId } from "../common/primitives.js";
import { compact, entity, Issues, nonEmpty } from "../common/validation.js";
import { BiosynthesisClass, BiosynthesisClassWire, classReferences } from "./classes/class.js";
import { Module, moduleReferences, ModuleWire } from "./modules/module.js";
import { Operon, OperonWire } from "./operon.js";
import { Path, PathWire } from "./path.js";

export interface BiosynthesisWire {
  classes: BiosynthesisClassWire[];
  modules?: ModuleWire[];
  operons?: OperonWire[];
  paths?: PathWire[];
}

export const BiosynthesisWire: z.ZodType<BiosynthesisWire, z.ZodTypeDef, unknown> = z.object({
  classes: z.array(BiosynthesisClassWire),
  modules: z.array(ModuleWire).optional(),
  operons: z.array(OperonWire).optional(),
  paths: z.array(PathWire).optional(),
});

export interface Biosynthesis {
  readonly classes: readonly BiosynthesisClass[];
  readonly modules: readonly Module[];
  readonly operons: readonly Operon[];
  readonly paths: readonly Path[];
}

export const Biosynthesis = entity<Biosynthesis, BiosynthesisWire>({
  name: "biosynthesis",
  wire: BiosynthesisWire,
  read: (raw) => ({
    classes: raw.classes.map(BiosynthesisClass.read),
    modules: (raw.modules ?? []).map(Module.read),
    operons: (raw.operons ?? []).map(Operon.read),
    paths: (raw.paths ?? []).map(Path.read),
  }),
  encode: (biosynthesis) =>
    compact({
      classes: biosynthesis.classes.map(BiosynthesisClass.encode),
      modules: nonEmpty(biosynthesis.modules.map(Module.encode)),
      operons: nonEmpty(biosynthesis.operons.map(Operon.encode)),
      paths: nonEmpty(biosynthesis.paths.map(Path.encode)),
    }),
  validate: (biosynthesis, ctx) => {
    const issues = new Issues();
    issues.check(biosynthesis.classes.length > 0, "classes", "At least one class is required");
    issues.each("classes", biosynthesis.classes, (value) => BiosynthesisClass.validate(value, ctx));
    issues.each("modules", biosynthesis.modules, (module) => Module.validate(module, ctx));
    issues.each("operons", biosynthesis.operons, (operon) => Operon.validate(operon, ctx));
    issues.each("paths", biosynthesis.paths, (path) => Path.validate(path, ctx));
    return issues.list();
  },
});

/**
 * Every gene touched by a module or operon, deduplicated and sorted.
 */
export function genesReferenced(biosynthesis: Biosynthesis): GeneId[] {
  const genes = new Set<GeneId>();
  for (const module of biosynthesis.modules) {
    module.genes.forEach((gene) => genes.add(gene));
  }
  for (const operon of biosynthesis.operons) {
    operon.genes.forEach((gene) => genes.add(gene));
  }
  return [...genes].sort();
}

/**
 * Every citation of the aggregate, deduplicated and sorted.
 */
export function biosynthesisReferences(biosynthesis: Biosynthesis): Citation[] {
  return uniqueCitations([
    ...biosynthesis.classes.flatMap(classReferences),
    ...biosynthesis.operons.flatMap((operon) => evidenceReferences(operon.evidence)),
    ...biosynthesis.modules.flatMap(moduleReferences),
    ...biosynthesis.paths.flatMap((path) => path.references),
  ]);
}
