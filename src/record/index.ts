/**
 * Reference sequence record service.
 */

export {
  CodingSequence,
  InMemoryRecord,
  type CodingSequenceInit,
  type InMemoryRecordInit,
  type SequenceRecord,
} from "./record.js";
