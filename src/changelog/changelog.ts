/**
 * Audit trail of an entry: who changed what, when, and who reviewed it.
 */

import { z } from "zod";
import {
  NEXT_RELEASE,
  ReleaseVersion,
  SubmitterID,
  validateIsoDate,
} from "../common/primitives.js";
import { compact, entity, isRelaxed, Issues } from "../common/validation.js";

// ═══════════════════════════════════════════════════════════════════════════
// RELEASE ENTRY
// ═══════════════════════════════════════════════════════════════════════════

export const ReleaseEntryWire = z.object({
  contributors: z.array(z.string()),
  reviewers: z.array(z.string()),
  date: z.string(),
  comment: z.string(),
});
export type ReleaseEntryWire = z.infer<typeof ReleaseEntryWire>;

/**
 * One line of a release: a comment with its authors and reviewers.
 */
export interface ReleaseEntry {
  readonly contributors: readonly SubmitterID[];
  readonly reviewers: readonly SubmitterID[];
  /** YYYY-MM-DD */
  readonly date: string;
  readonly comment: string;
}

export const ReleaseEntry = entity<ReleaseEntry, ReleaseEntryWire>({
  name: "release entry",
  wire: ReleaseEntryWire,
  read: (raw) => ({ ...raw }),
  encode: (entry) => ({
    contributors: [...entry.contributors],
    reviewers: [...entry.reviewers],
    date: entry.date,
    comment: entry.comment,
  }),
  validate: (entry, ctx) => {
    const issues = new Issues();
    issues.check(entry.contributors.length > 0, "contributors", "At least one contributor is required");
    issues.each("contributors", entry.contributors, (id) => SubmitterID.validate(id, ctx));
    if (!isRelaxed(ctx)) {
      issues.check(entry.reviewers.length > 0, "reviewers", "At least one reviewer is required");
    }
    issues.each("reviewers", entry.reviewers, (id) => SubmitterID.validate(id, ctx));
    issues.nested("date", validateIsoDate(entry.date));
    issues.check(entry.comment.trim().length > 0, "comment", "Comment must not be empty");
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// RELEASE
// ═══════════════════════════════════════════════════════════════════════════

export const ReleaseWire = z.object({
  version: z.string(),
  date: z.string().optional(),
  entries: z.array(ReleaseEntryWire),
});
export type ReleaseWire = z.infer<typeof ReleaseWire>;

export interface Release {
  readonly version: ReleaseVersion;
  /** Publication date; only the "next" release may lack one */
  readonly date?: string;
  readonly entries: readonly ReleaseEntry[];
}

export const Release = entity<Release, ReleaseWire>({
  name: "release",
  wire: ReleaseWire,
  read: (raw) => ({
    version: raw.version,
    date: raw.date,
    entries: raw.entries.map(ReleaseEntry.read),
  }),
  encode: (release) =>
    compact({
      version: release.version,
      date: release.date,
      entries: release.entries.map(ReleaseEntry.encode),
    }),
  validate: (release, ctx) => {
    const issues = new Issues();
    issues.nested("version", ReleaseVersion.validate(release.version, ctx));
    if (release.date === undefined) {
      issues.check(release.version === NEXT_RELEASE, "date", "Date is required for published releases");
    } else {
      issues.nested("date", validateIsoDate(release.date));
    }
    issues.check(release.entries.length > 0, "entries", "At least one entry is required");
    issues.each("entries", release.entries, (entry) => ReleaseEntry.validate(entry, ctx));
    return issues.list();
  },
});

// ═══════════════════════════════════════════════════════════════════════════
// CHANGELOG
// ═══════════════════════════════════════════════════════════════════════════

export const ChangeLogWire = z.object({
  releases: z.array(ReleaseWire),
});
export type ChangeLogWire = z.infer<typeof ChangeLogWire>;

export interface ChangeLog {
  readonly releases: readonly Release[];
}

export const ChangeLog = entity<ChangeLog, ChangeLogWire>({
  name: "changelog",
  wire: ChangeLogWire,
  read: (raw) => ({ releases: raw.releases.map(Release.read) }),
  encode: (changelog) => ({ releases: changelog.releases.map(Release.encode) }),
  validate: (changelog, ctx) =>
    new Issues().each("releases", changelog.releases, (release) => Release.validate(release, ctx)).list(),
});
