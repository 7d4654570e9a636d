/**
 * Chord analyzer
 *
 * Names the chord formed by the notes in one column of a staff, relative to a
 * chosen root string. Repeating the analysis walks the root across strings.
 */

import { STRING_COUNT } from "@/constants/tab"
import { type TabContext, staffOf } from "@/lib/tab/cursor"
import { NoNotesInChord } from "@/lib/tab/tab-errors"
import type { TabDocument } from "@/lib/tab/tab-document"
import { type Tuning, normalizePitch, pitchName } from "@/lib/tab/tuning"
import { Effect } from "effect"
import {
  CHORD_PATTERNS,
  type ChordPattern,
  type ChordPatternTable,
  matchPattern,
} from "./chord-patterns"

/** Frets per string, high string first; null where the string is not played */
export type ChordFrets = readonly (number | null)[]

export interface ChordAnalysis {
  readonly staffIndex: number
  readonly cellIndex: number
  readonly rootString: number
  readonly rootPitch: number
  /** Root name plus chord suffix, e.g. "A", "Am", "C/F#", "E??" */
  readonly chordName: string
  readonly disclaimer: string
  readonly spelling: string
}

export interface AnalyzeOptions {
  readonly twelveToneSpelling?: boolean
  readonly table?: ChordPatternTable
}

const UNKNOWN_CHORD = "??"

const DEGREE_LABELS = ["rt", "b2", "2", "b3", "3", "4", "b5", "5", "b6", "6", "7", "maj7"] as const

export function degreeLabel(interval: number, pattern: ChordPattern | null): string {
  return pattern?.degrees?.[String(interval)] ?? DEGREE_LABELS[interval] ?? "?"
}

/**
 * Read the column under the cursor as one fret (or null) per string
 */
export function chordFretsAt(doc: TabDocument, ctx: TabContext): ChordFrets {
  const staff = staffOf(doc, ctx)
  return Array.from({ length: STRING_COUNT }, (_, s) => {
    const cell = doc.cell(staff, s, ctx.cellIndex)
    return cell._tag === "Note" ? cell.fret : null
  })
}

/**
 * First string holding a note, scanning cyclically from `start` over at most six strings
 */
export const findRootString = (
  frets: ChordFrets,
  start: number,
  location: { readonly staffIndex: number; readonly cellIndex: number },
): Effect.Effect<number, NoNotesInChord> =>
  Effect.gen(function* () {
    for (let step = 0; step < STRING_COUNT; step++) {
      const s = (start + step) % STRING_COUNT
      if (frets[s] !== null && frets[s] !== undefined) return s
    }
    return yield* Effect.fail(new NoNotesInChord(location))
  })

interface PitchCollection {
  readonly pitches: readonly (number | null)[]
  readonly counts: ReadonlyMap<number, number>
  readonly bass: number | null
}

function collectPitches(frets: ChordFrets, tuning: Tuning): PitchCollection {
  const counts = new Map<number, number>()
  const pitches: (number | null)[] = []
  let bass: number | null = null

  for (let s = 0; s < STRING_COUNT; s++) {
    const fret = frets[s] ?? null
    if (fret === null) {
      pitches.push(null)
      continue
    }
    const pitch = normalizePitch(fret + (tuning.pitches[s] ?? 0))
    pitches.push(pitch)
    counts.set(pitch, (counts.get(pitch) ?? 0) + 1)
    // Lowest string is scanned last and wins
    bass = pitch
  }
  return { pitches, counts, bass }
}

export function intervalSet(pitches: Iterable<number>, root: number): number[] {
  const intervals = new Set<number>()
  for (const pitch of pitches) {
    if (pitch !== root) intervals.add(normalizePitch(pitch - root))
  }
  return [...intervals].sort((a, b) => a - b)
}

interface ResolvedName {
  readonly suffix: string
  readonly disclaimer: string
  readonly pattern: ChordPattern | null
}

function resolveName(
  collection: PitchCollection,
  root: number,
  table: ChordPatternTable,
): ResolvedName {
  const direct = matchPattern(intervalSet(collection.counts.keys(), root), table)
  if (direct) {
    return { suffix: direct.name, disclaimer: direct.disclaimer, pattern: direct }
  }

  const { bass } = collection
  if (bass !== null && bass !== root && collection.counts.get(bass) === 1) {
    const withoutBass = [...collection.counts.keys()].filter(pitch => pitch !== bass)
    const slash = matchPattern(intervalSet(withoutBass, root), table)
    if (slash) {
      return {
        suffix: `${slash.name}/${pitchName(bass)}`,
        disclaimer: slash.disclaimer,
        pattern: slash,
      }
    }
  }

  return { suffix: UNKNOWN_CHORD, disclaimer: "", pattern: null }
}

function spell(
  pitches: readonly (number | null)[],
  root: number,
  pattern: ChordPattern | null,
  twelveTone: boolean,
): string {
  const degrees = pitches
    .map(pitch => (pitch === null ? "x" : degreeLabel(normalizePitch(pitch - root), pattern)))
    .join(" ")
  if (!twelveTone) return degrees

  const semitones = [...pitches]
    .reverse()
    .map(pitch => (pitch === null ? "x" : String(normalizePitch(pitch - root))))
    .join(" ")
  return `${degrees} (${semitones})`
}

/**
 * Name the chord in `frets` with the note on `rootString` as root
 */
export function analyzeFrets(
  frets: ChordFrets,
  tuning: Tuning,
  rootString: number,
  location: { readonly staffIndex: number; readonly cellIndex: number },
  options: AnalyzeOptions = {},
): ChordAnalysis {
  const collection = collectPitches(frets, tuning)
  const root = collection.pitches[rootString] ?? 0
  const table = options.table ?? CHORD_PATTERNS
  const { suffix, disclaimer, pattern } = resolveName(collection, root, table)

  return {
    staffIndex: location.staffIndex,
    cellIndex: location.cellIndex,
    rootString,
    rootPitch: root,
    chordName: `${pitchName(root)}${suffix}`,
    disclaimer,
    spelling: spell(collection.pitches, root, pattern, options.twelveToneSpelling ?? false),
  }
}

/**
 * Analyze the chord under the cursor. When `previous` is an analysis of the
 * same column, the root moves on to the next string that holds a note.
 */
export const analyzeChord = (
  doc: TabDocument,
  ctx: TabContext,
  tuning: Tuning,
  previous: ChordAnalysis | null,
  options: AnalyzeOptions = {},
): Effect.Effect<ChordAnalysis, NoNotesInChord> =>
  Effect.gen(function* () {
    const frets = chordFretsAt(doc, ctx)
    const location = { staffIndex: ctx.staffIndex, cellIndex: ctx.cellIndex }
    const repeat =
      previous !== null &&
      previous.staffIndex === ctx.staffIndex &&
      previous.cellIndex === ctx.cellIndex
    const start = repeat ? previous.rootString + 1 : ctx.stringIndex

    const rootString = yield* findRootString(frets, start % STRING_COUNT, location)
    return analyzeFrets(frets, tuning, rootString, location, options)
  })

export function formatChordMessage(analysis: ChordAnalysis): string {
  return `${analysis.chordName}${analysis.disclaimer}  ${analysis.spelling}`
}
