/**
 * Tablature error types using Effect.ts tagged errors
 *
 * All of these are recoverable. A failed operation leaves the document and
 * the session exactly as they were.
 */

import { Data } from "effect"

/**
 * The point is not on a string-line of any staff. Commands degrade to
 * inserting the triggering key literally.
 */
export class NotInTabContext extends Data.TaggedError("NotInTabContext")<{
  readonly point: number
}> {}

export class RegionSpansMultipleStaves extends Data.TaggedError("RegionSpansMultipleStaves")<{
  readonly beginStaff: number
  readonly endStaff: number
}> {}

export class InvalidTuningName extends Data.TaggedError("InvalidTuningName")<{
  readonly note: string
  readonly reason: string
}> {}

export class NoNotesInChord extends Data.TaggedError("NoNotesInChord")<{
  readonly staffIndex: number
  readonly cellIndex: number
}> {}

export class ChordLabelOutOfSequence extends Data.TaggedError("ChordLabelOutOfSequence")<object> {}

export class FretOutOfRange extends Data.TaggedError("FretOutOfRange")<{
  readonly fret: number
}> {}

export class EmptyClipboard extends Data.TaggedError("EmptyClipboard")<object> {}

/**
 * Transposition amounts must be whole semitones
 */
export class InvalidTransposition extends Data.TaggedError("InvalidTransposition")<{
  readonly semitones: number
}> {}

/**
 * A context used against a document it was not resolved from. This is a
 * caller bug, so editors throw it instead of failing an Effect.
 */
export class StaleTabContext extends Data.TaggedError("StaleTabContext")<{
  readonly staffIndex: number
}> {}

export type TabError =
  | NotInTabContext
  | RegionSpansMultipleStaves
  | InvalidTuningName
  | NoNotesInChord
  | ChordLabelOutOfSequence
  | FretOutOfRange
  | InvalidTransposition
  | EmptyClipboard

/**
 * Human-readable message for a tab error, shown by the host in its echo area
 */
export function describeTabError(error: TabError): string {
  switch (error._tag) {
    case "NotInTabContext":
      return "Not in tab"
    case "RegionSpansMultipleStaves":
      return `Region spans staves ${error.beginStaff} and ${error.endStaff}`
    case "InvalidTuningName":
      return `Invalid tuning "${error.note}": ${error.reason}`
    case "NoNotesInChord":
      return "No notes in chord"
    case "ChordLabelOutOfSequence":
      return "Label must immediately follow chord analysis"
    case "FretOutOfRange":
      return `Fret ${error.fret} is out of range`
    case "InvalidTransposition":
      return `Cannot transpose by ${error.semitones} semitones`
    case "EmptyClipboard":
      return "Nothing to yank"
  }
}
