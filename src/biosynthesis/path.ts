/**
 * Biosynthetic paths.
 *
 * Steps are written as a single string: ">" separates ordered stages and ","
 * separates items within a stage whose order is unknown. An item may name a
 * module in square brackets, e.g. "[M1] + orfB".
 */

import { z } from "zod";
import {
  CitationList,
  encodeCitations,
  readCitations,
  validateCitationList,
  type Citation,
} from "../common/citation.js";
import type { ValidationIssue } from "../common/errors.js";
import { validateSmiles, type Smiles } from "../common/primitives.js";
import { compact, entity, Issues } from "../common/validation.js";

// ═══════════════════════════════════════════════════════════════════════════
// STEP GRAMMAR
// ═══════════════════════════════════════════════════════════════════════════

export const ORDERED_SEPARATOR = ">";
export const UNORDERED_SEPARATOR = ",";

/** Ordered stages, each a set of unordered items */
export type Steps = readonly (readonly string[])[];

export function parseSteps(text: string): string[][] {
  return text.split(ORDERED_SEPARATOR).map((stage) => stage.split(UNORDERED_SEPARATOR).map((item) => item.trim()));
}

export function formatSteps(steps: Steps): string {
  return steps.map((stage) => stage.join(`${UNORDERED_SEPARATOR} `)).join(` ${ORDERED_SEPARATOR} `);
}

export function validateSteps(steps: Steps): ValidationIssue[] {
  const issues = new Issues();
  steps.forEach((stage, stageIndex) => {
    stage.forEach((item, itemIndex) => {
      const field = `steps[${stageIndex}][${itemIndex}]`;
      if (!item.trim()) {
        issues.add(field, "Empty step item");
      } else if (item.includes(ORDERED_SEPARATOR) || item.includes(UNORDERED_SEPARATOR)) {
        issues.add(field, `Step item '${item}' contains a separator`);
      }
    });
  });
  return issues.list();
}

/**
 * Module names referenced in brackets anywhere in the steps.
 */
export function stepModules(steps: Steps): string[] {
  const names: string[] = [];
  for (const item of steps.flat()) {
    for (const match of item.matchAll(/\[([^\]]+)\]/g)) {
      const name = match[1];
      if (name !== undefined) {
        names.push(name.trim());
      }
    }
  }
  return names;
}

// ═══════════════════════════════════════════════════════════════════════════
// PRODUCTS
// ═══════════════════════════════════════════════════════════════════════════

export const ProductWire = z.object({
  name: z.string(),
  structure: z.string().optional(),
  comment: z.string().optional(),
});
export type ProductWire = z.infer<typeof ProductWire>;

export interface Product {
  readonly name: string;
  readonly structure?: Smiles;
  readonly comment?: string;
}

export const Product = entity<Product, ProductWire>({
  name: "product",
  wire: ProductWire,
  read: (raw) => compact({ name: raw.name, structure: raw.structure, comment: raw.comment }),
  encode: (product) =>
    compact({
      name: product.name,
      structure: product.structure || undefined,
      comment: product.comment || undefined,
    }),
  validate: (product) => {
    const issues = new Issues();
    issues.check(Boolean(product.name), "name", "Missing name");
    if (product.structure) {
      issues.nested("structure", validateSmiles(product.structure));
    }
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// PATH
// ═══════════════════════════════════════════════════════════════════════════

export const PathWire = z.object({
  products: z.array(ProductWire),
  steps: z.string(),
  references: CitationList,
  isSubcluster: z.boolean(),
  producesPrecursor: z.boolean(),
});
export type PathWire = z.infer<typeof PathWire>;

export interface Path {
  readonly products: readonly Product[];
  readonly steps: Steps;
  readonly references: readonly Citation[];
  readonly isSubcluster: boolean;
  readonly producesPrecursor: boolean;
}

export const Path = entity<Path, PathWire>({
  name: "path",
  wire: PathWire,
  read: (raw) => ({
    products: raw.products.map(Product.read),
    steps: parseSteps(raw.steps),
    references: readCitations(raw.references),
    isSubcluster: raw.isSubcluster,
    producesPrecursor: raw.producesPrecursor,
  }),
  encode: (path) => ({
    products: path.products.map(Product.encode),
    steps: formatSteps(path.steps),
    references: encodeCitations(path.references),
    isSubcluster: path.isSubcluster,
    producesPrecursor: path.producesPrecursor,
  }),
  validate: (path, ctx) =>
    new Issues()
      .check(path.products.length > 0, "products", "Missing products")
      .each("products", path.products, (product) => Product.validate(product, ctx))
      .nested("", validateSteps(path.steps))
      .nested("references", validateCitationList(path.references, ctx))
      .list(),
});
