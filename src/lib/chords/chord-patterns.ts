/**
 * Chord pattern table
 *
 * Patterns are grouped by note count and kept in file order. Matching takes
 * the first entry that fits, so order decides between entries that share an
 * interval set (7sus4 is listed before 11 and always wins).
 */

import { Schema } from "effect"
import chordPatternData from "./chord-patterns.json"

const Interval = Schema.Number.pipe(Schema.int(), Schema.between(1, 11))

export const ChordPatternSchema = Schema.Struct({
  noteCount: Schema.Number.pipe(Schema.int(), Schema.between(1, 6)),
  /** Ascending semitone offsets from the root, root excluded. Empty matches any set. */
  intervals: Schema.Array(Interval),
  name: Schema.String,
  disclaimer: Schema.String,
  /** Degree labels replacing the defaults for this chord, keyed by interval */
  degrees: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.String })),
}).pipe(
  Schema.filter(
    pattern =>
      pattern.intervals.length === 0 ||
      pattern.intervals.length === pattern.noteCount - 1 ||
      `expected ${pattern.noteCount - 1} intervals for a ${pattern.noteCount}-note chord`,
  ),
)

export type ChordPattern = typeof ChordPatternSchema.Type

export type ChordPatternTable = ReadonlyMap<number, readonly ChordPattern[]>

export function buildPatternTable(patterns: readonly ChordPattern[]): ChordPatternTable {
  const table = new Map<number, ChordPattern[]>()
  for (const pattern of patterns) {
    const group = table.get(pattern.noteCount) ?? []
    group.push(pattern)
    table.set(pattern.noteCount, group)
  }
  return table
}

export const CHORD_PATTERNS: ChordPatternTable = buildPatternTable(
  Schema.decodeUnknownSync(Schema.Array(ChordPatternSchema))(chordPatternData),
)

function sameIntervals(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

/**
 * First pattern for this interval set, in table order
 */
export function matchPattern(
  intervals: readonly number[],
  table: ChordPatternTable = CHORD_PATTERNS,
): ChordPattern | null {
  const candidates = table.get(intervals.length + 1) ?? []
  return (
    candidates.find(
      pattern => pattern.intervals.length === 0 || sameIntervals(pattern.intervals, intervals),
    ) ?? null
  )
}
