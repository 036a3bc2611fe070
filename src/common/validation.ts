/**
 * Validation plumbing shared by every entity.
 *
 * Each entity is described once as a codec: a zod schema for the structural
 * shape of its wire form, a reader that turns the parsed wire form into the
 * in-memory value, an encoder for the way back, and a validator that collects
 * every invariant violation of the value and its subtree.
 *
 * `create` is the single construction point: it validates the whole subtree
 * once against an explicit context and deep-freezes the result.
 */

import type { z, ZodIssue } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";
import type { QualityLevel } from "./enums.js";
import type { CodingSequence, SequenceRecord } from "../record/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Ambient parameters threaded through every validating call.
 */
export interface ValidationContext {
  /** Quality tier of the owning entry; absent means full validation */
  readonly quality?: QualityLevel;
  /** Reference sequence used for gene and coordinate cross-checks */
  readonly record?: SequenceRecord;
}

/** No relaxation and no record cross-checks */
export const FULL_VALIDATION: ValidationContext = Object.freeze({});

/**
 * Whether tier-gated requirements are waived.
 */
export function isRelaxed(ctx: ValidationContext): boolean {
  return ctx.quality === "questionable";
}

/**
 * Look up the coding sequence of a gene when a record is available.
 */
export function cdsFor(ctx: ValidationContext, gene: string): CodingSequence | undefined {
  return ctx.record?.getCds(gene);
}

// ═══════════════════════════════════════════════════════════════════════════
// ISSUE COLLECTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Join a parent field path with a child path or index.
 */
export function joinField(parent: string, child: string | number): string {
  if (typeof child === "number") {
    return `${parent}[${child}]`;
  }
  if (!parent) return child;
  if (!child) return parent;
  return child.startsWith("[") ? `${parent}${child}` : `${parent}.${child}`;
}

/**
 * Accumulates violations so that a validator reports all of them at once.
 */
export class Issues {
  private readonly collected: ValidationIssue[] = [];

  add(field: string, message: string): this {
    this.collected.push({ field, message });
    return this;
  }

  /** Record a violation unless the condition holds */
  check(condition: boolean, field: string, message: string): this {
    if (!condition) {
      this.add(field, message);
    }
    return this;
  }

  /** Merge issues reported by a nested validator under a field prefix */
  nested(field: string, issues: readonly ValidationIssue[]): this {
    for (const issue of issues) {
      this.collected.push({ field: joinField(field, issue.field), message: issue.message });
    }
    return this;
  }

  /** Validate every element of a list, indexing the field path */
  each<T>(
    field: string,
    values: readonly T[],
    validate: (value: T) => readonly ValidationIssue[]
  ): this {
    values.forEach((value, index) => {
      this.nested(joinField(field, index), validate(value));
    });
    return this;
  }

  list(): ValidationIssue[] {
    return [...this.collected];
  }
}

/**
 * Convert zod issues to our structured format.
 */
export function formatZodIssues(zodIssues: readonly ZodIssue[]): ValidationIssue[] {
  return zodIssues.map((issue) => ({
    field: issue.path.reduce<string>((path, part) => joinField(path, part), ""),
    message: issue.message,
  }));
}

/**
 * Parse a wire value against its structural schema.
 *
 * @throws ValidationError listing every structural mismatch
 */
export function parseWire<W>(
  schema: z.ZodType<W, z.ZodTypeDef, unknown>,
  raw: unknown,
  subject: string
): W {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(formatZodIssues(result.error.issues), subject);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMMUTABILITY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Deep freeze a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════
// CODECS
// ═══════════════════════════════════════════════════════════════════════════

export interface EntityDefinition<T, W> {
  /** Used in error summaries, e.g. "Invalid locus: 2 validation errors" */
  readonly name: string;
  /** Structural schema of the wire form */
  readonly wire: z.ZodType<W, z.ZodTypeDef, unknown>;
  /** Structural conversion from the parsed wire form; never validates */
  read(wire: W): T;
  encode(value: T): W;
  validate(value: T, ctx: ValidationContext): ValidationIssue[];
}

export interface Codec<T, W> extends EntityDefinition<T, W> {
  /** Validate, then freeze. Throws ValidationError with every violation. */
  create(value: T, ctx: ValidationContext): T;
  /** Structural parse followed by `create` */
  decode(raw: unknown, ctx: ValidationContext): T;
}

/**
 * Build a codec from an entity definition.
 */
export function entity<T, W>(definition: EntityDefinition<T, W>): Codec<T, W> {
  const create = (value: T, ctx: ValidationContext): T => {
    const issues = definition.validate(value, ctx);
    if (issues.length > 0) {
      throw new ValidationError(issues, definition.name);
    }
    return deepFreeze(value);
  };

  return {
    ...definition,
    create,
    decode: (raw, ctx) => create(definition.read(parseWire(definition.wire, raw, definition.name)), ctx),
  };
}

/**
 * Drop keys whose value is undefined from a freshly built wire object,
 * so unset optionals are omitted rather than emitted.
 */
export function compact<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
}

/**
 * `values` when non-empty, otherwise undefined; for optional wire lists.
 */
export function nonEmpty<T>(values: readonly T[]): T[] | undefined {
  return values.length > 0 ? [...values] : undefined;
}
