/**
 * Changelog model.
 */

export {
  ChangeLog,
  ChangeLogWire,
  Release,
  ReleaseEntry,
  ReleaseEntryWire,
  ReleaseWire,
} from "./changelog.js";
