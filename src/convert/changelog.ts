/**
 * Changelog reconstruction.
 *
 * Legacy changes keep comments, contributors and (sometimes) timestamps in
 * parallel arrays that were edited by hand over many releases. Each change
 * is matched against the shapes found in the legacy corpus, in order; the
 * first shape that fits decides who wrote which comment. Anything else is a
 * migration failure.
 */

import type { ChangeLog, Release, ReleaseEntry } from "../changelog/changelog.js";
import { MigrationError } from "../common/errors.js";
import { NEXT_RELEASE, SYSTEM_SUBMITTER, type SubmitterID } from "../common/primitives.js";
import type { LegacyChange } from "../legacy/model.js";

/** Publication dates of the legacy releases */
export const RELEASE_DATES: Readonly<Record<string, string>> = {
  "1.0": "2015-06-12",
  "1.1": "2015-08-17",
  "1.2": "2015-12-24",
  "1.3": "2016-09-03",
  "1.4": "2018-08-06",
  "2.0": "2019-10-16",
  "3.0": "2022-09-15",
  "3.1": "2022-10-07",
};

/** Comments that record a review rather than a change */
export const REVIEW_MESSAGES: ReadonlySet<string> = new Set([
  "Changes reviewed and approved.",
  "Changes reviewed and approved",
  "Entry reviewed and approved.",
  "Reviewed changes and approved.",
]);

const MISMATCH = "Mismatch between number of comments and contributors";

function entry(date: string, comment: string, contributors: readonly SubmitterID[]): ReleaseEntry {
  return { contributors: [...contributors], reviewers: [SYSTEM_SUBMITTER], date, comment };
}

const isSystem = (contributor: string | undefined) => contributor === SYSTEM_SUBMITTER;

// ═══════════════════════════════════════════════════════════════════════════
// SHAPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Timestamped changes: review comments turn their authors into reviewers of
 * the whole release, every other comment is dated by its own timestamp.
 */
function fromTimestamps(change: LegacyChange, timestamps: readonly string[]): ReleaseEntry[] {
  const { comments, contributors } = change;
  // Every array must match the others; two matching arrays do not excuse the third.
  if (comments.length !== contributors.length || comments.length !== timestamps.length) {
    throw new MigrationError("Mismatch between number of comments, contributors and timestamps");
  }
  const reviewers: SubmitterID[] = [];
  const lines: { contributor: string; comment: string; timestamp: string }[] = [];
  comments.forEach((comment, index) => {
    const contributor = contributors[index] ?? "";
    if (REVIEW_MESSAGES.has(comment)) {
      reviewers.push(contributor);
    } else {
      lines.push({ contributor, comment, timestamp: timestamps[index] ?? "" });
    }
  });
  return lines.map((line) => ({
    contributors: [line.contributor],
    reviewers: [...reviewers],
    date: line.timestamp.split("T")[0] ?? line.timestamp,
    comment: line.comment,
  }));
}

/**
 * Undated changes, attributed by the shape of the contributor list.
 */
function fromShape(change: LegacyChange, date: string): ReleaseEntry[] {
  const { comments, contributors } = change;
  const first = contributors[0];
  const last = contributors[contributors.length - 1];

  // one contributor per comment
  if (contributors.length === comments.length) {
    return comments.map((comment, index) => entry(date, comment, [contributors[index] ?? ""]));
  }

  // a single author of every comment
  if (contributors.length === 1 && first !== undefined) {
    return comments.map((comment) => entry(date, comment, [first]));
  }

  // real contributors first, then comments added by the system
  if (isSystem(last)) {
    const real = contributors.indexOf(SYSTEM_SUBMITTER);
    if (real > comments.length) {
      throw new MigrationError(MISMATCH);
    }
    return [
      ...comments.slice(0, real).map((comment, index) => entry(date, comment, [contributors[index] ?? ""])),
      ...comments.slice(real).map((comment) => entry(date, comment, [SYSTEM_SUBMITTER])),
    ];
  }

  // one comment written together
  if (comments.length === 1) {
    return [entry(date, comments[0] ?? "", contributors)];
  }

  // system placeholders, then one real contributor for the final comment
  if (isSystem(first) && last !== undefined) {
    if (!contributors.slice(0, -1).every(isSystem)) {
      throw new MigrationError(MISMATCH);
    }
    return [
      ...comments.slice(0, -1).map((comment) => entry(date, comment, [SYSTEM_SUBMITTER])),
      entry(date, comments[comments.length - 1] ?? "", [last]),
    ];
  }

  // a submission, system placeholders, then a final real contributor
  if (
    contributors.length >= 3 &&
    first !== undefined &&
    last !== undefined &&
    comments.length >= 2 &&
    comments[0] === "Submitted" &&
    contributors.slice(1, -1).every(isSystem)
  ) {
    return [
      entry(date, comments[0], [first]),
      ...comments.slice(1, -1).map((comment) => entry(date, comment, [SYSTEM_SUBMITTER])),
      entry(date, comments[comments.length - 1] ?? "", [last]),
    ];
  }

  throw new MigrationError(MISMATCH);
}

// ═══════════════════════════════════════════════════════════════════════════
// RELEASES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Rebuild one release from the legacy change at `index`.
 */
export function convertRelease(change: LegacyChange, index: number): Release {
  const isNext = change.version === NEXT_RELEASE;
  const date = isNext ? undefined : RELEASE_DATES[change.version];
  if (!isNext && date === undefined) {
    throw new MigrationError(`Unknown release version: ${change.version}`, change.version);
  }
  const version = isNext ? NEXT_RELEASE : `${index + 1}`;

  const timestamps = change.updated_at ?? [];
  let entries: ReleaseEntry[];
  if (timestamps.length > 0) {
    entries = fromTimestamps(change, timestamps);
  } else if (date === undefined) {
    throw new MigrationError(`Release '${change.version}' has no timestamps to date its entries`);
  } else {
    entries = fromShape(change, date);
  }

  return date === undefined ? { version, entries } : { version, date, entries };
}

/**
 * Rebuild the changelog of a legacy document. Numbered releases are
 * renumbered from 1 by position; "next" stays "next".
 */
export function convertChangelog(changes: readonly LegacyChange[]): ChangeLog {
  return { releases: changes.map(convertRelease) };
}
