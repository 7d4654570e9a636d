// Cells
export {
  type Cell,
  type EmbKind,
  BARLINE,
  BLANK,
  EMBELLISHMENT_MARKS,
  formatCell,
  isEmbKind,
  isNote,
  note,
  parseCell,
} from "./cell"

// Document
export {
  type LinePosition,
  type Staff,
  TabDocument,
  cellColumn,
  cellCount,
  isStringLine,
  lastLine,
} from "./tab-document"

// Cursor
export {
  type StaffDirection,
  type TabContext,
  advance,
  contextAt,
  moveStaff,
  moveStrings,
  pointOf,
  resolve,
  staffOf,
} from "./cursor"

// Editing
export {
  type DeleteDirection,
  type TabClipboard,
  type TabEdit,
  blankStringLine,
  deleteCells,
  insertColumns,
  killRegion,
  makeStaff,
  toggleBarline,
  yank,
} from "./staff-editor"

export {
  type OctaveDirection,
  clearNote,
  octaveShift,
  placeNote,
  toggleEmbellishment,
} from "./notes"

// Tuning and transposition
export {
  type Tuning,
  STANDARD_TUNING,
  labelPitch,
  learnTuning,
  normalizePitch,
  pitchName,
  retuneString,
  tuningLabel,
} from "./tuning"

export {
  copyRetune,
  retuneDeltas,
  shiftFret,
  transposeRegion,
  transposeUniform,
} from "./transpose"

// Errors
export {
  ChordLabelOutOfSequence,
  EmptyClipboard,
  FretOutOfRange,
  InvalidTransposition,
  InvalidTuningName,
  NoNotesInChord,
  NotInTabContext,
  RegionSpansMultipleStaves,
  StaleTabContext,
  type TabError,
  describeTabError,
} from "./tab-errors"

export { formatErrorForLog, setTabDebug, tabLog } from "./tab-log"
