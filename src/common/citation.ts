/**
 * Literature citations.
 *
 * A citation is a (database, value) pair serialized as "database:value".
 * Two citations with the same content are the same citation; identity is
 * the wire form.
 */

import { z } from "zod";
import type { ValidationIssue } from "./errors.js";
import { entity, isRelaxed, Issues, type ValidationContext } from "./validation.js";

export const CitationDatabase = z.enum(["pubmed", "doi", "patent", "url"]);
export type CitationDatabase = z.infer<typeof CitationDatabase>;

const VALUE_PATTERNS: Record<CitationDatabase, RegExp> = {
  pubmed: /^\d+$/,
  doi: /^10\.\d{4,9}\/[-._;()/:a-zA-Z0-9]+$/,
  patent: /^.+$/,
  url: /^https?:\/\/(www\.)?[-a-zA-Z0-9@:%._+~#=]{2,256}\.[a-z]{2,6}\b([-a-zA-Z0-9@:%_+.~#?&/=]*)$/,
};

export interface Citation {
  readonly database: string;
  readonly value: string;
}

/**
 * Split "database:value" at the first colon.
 */
export function parseCitation(raw: string): Citation {
  const separator = raw.indexOf(":");
  if (separator === -1) {
    return { database: raw, value: "" };
  }
  return { database: raw.slice(0, separator), value: raw.slice(separator + 1) };
}

export function formatCitation(citation: Citation): string {
  return `${citation.database}:${citation.value}`;
}

function validateCitation(citation: Citation): ValidationIssue[] {
  const database = CitationDatabase.safeParse(citation.database);
  if (!database.success) {
    return [{ field: "", message: `Invalid database type '${citation.database}'` }];
  }
  if (!VALUE_PATTERNS[database.data].test(citation.value)) {
    return [
      {
        field: "",
        message: `Invalid value '${citation.value}' for database '${citation.database}'`,
      },
    ];
  }
  return [];
}

export const Citation = entity<Citation, string>({
  name: "citation",
  wire: z.string(),
  read: parseCitation,
  encode: formatCitation,
  validate: validateCitation,
});

// ═══════════════════════════════════════════════════════════════════════════
// VALUE EQUALITY
// ═══════════════════════════════════════════════════════════════════════════

/** Identity of a citation; equal keys mean equal citations */
export function citationKey(citation: Citation): string {
  return formatCitation(citation);
}

export function sameCitation(a: Citation, b: Citation): boolean {
  return a.database === b.database && a.value === b.value;
}

/**
 * Deduplicate by content and sort by wire form.
 */
export function uniqueCitations(citations: Iterable<Citation>): Citation[] {
  const byKey = new Map<string, Citation>();
  for (const citation of citations) {
    byKey.set(citationKey(citation), citation);
  }
  return [...byKey.keys()].sort().flatMap((key) => {
    const citation = byKey.get(key);
    return citation ? [citation] : [];
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// LISTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate a list of citations that must be non-empty once past the
 * lowest quality tier.
 */
export function validateCitationList(
  citations: readonly Citation[],
  ctx: ValidationContext,
  message = "At least one reference is required"
): ValidationIssue[] {
  const issues = new Issues();
  if (citations.length === 0 && !isRelaxed(ctx)) {
    issues.add("", message);
  }
  issues.each("", citations, validateCitation);
  return issues.list();
}

export const CitationList = z.array(z.string());

export function readCitations(raw: readonly string[] | undefined): Citation[] {
  return (raw ?? []).map(parseCitation);
}

export function encodeCitations(citations: readonly Citation[]): string[] {
  return citations.map(formatCitation);
}
