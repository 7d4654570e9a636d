import { OCTAVE, PREFIX_WIDTH, STRING_COUNT } from "@/constants/tab"
import { Effect } from "effect"
import type { TabContext } from "./cursor"
import { staffOf } from "./cursor"
import { InvalidTuningName } from "./tab-errors"
import type { Staff, TabDocument } from "./tab-document"

/**
 * Open-string pitch classes plus the line prefix of each string.
 * Pitch classes are counted from E (E=0, F=1, ... D#=11), high string first.
 */
export interface Tuning {
  readonly pitches: readonly number[]
  readonly labels: readonly string[]
}

export const STANDARD_TUNING: Tuning = {
  pitches: [0, 7, 3, 10, 5, 0],
  labels: ["e-|", "B-|", "G-|", "D-|", "A-|", "E-|"],
}

const LETTER_PITCHES: Readonly<Record<string, number>> = {
  E: 0,
  F: 1,
  G: 3,
  A: 5,
  B: 7,
  C: 8,
  D: 10,
}

const PITCH_NAMES = ["E", "F", "F#", "G", "G#", "A", "A#", "B", "C", "C#", "D", "D#"] as const

const NOTE_NAME_REGEX = /^([A-Ga-g])([#b])?$/

export function normalizePitch(value: number): number {
  return ((value % OCTAVE) + OCTAVE) % OCTAVE
}

export function pitchName(pitchClass: number): string {
  return PITCH_NAMES[normalizePitch(pitchClass)] ?? "?"
}

/**
 * Pitch class named by a string-line prefix such as "F#|" or "e-|"
 */
export function labelPitch(label: string): number {
  const base = LETTER_PITCHES[label.charAt(0).toUpperCase()] ?? 0
  const accidental = label.charAt(1)
  const shift = accidental === "#" ? 1 : accidental === "b" ? -1 : 0
  return normalizePitch(base + shift)
}

export function learnTuning(doc: TabDocument, staff: Staff): Tuning {
  const labels = Array.from({ length: STRING_COUNT }, (_, s) =>
    doc.stringLine(staff, s).slice(0, PREFIX_WIDTH),
  )
  return { pitches: labels.map(labelPitch), labels }
}

function swapCase(letter: string): string {
  const upper = letter.toUpperCase()
  return letter === upper ? letter.toLowerCase() : upper
}

/**
 * Build the prefix for `name` on `stringIndex`, flipping the letter's case
 * when the first character would collide with another string.
 */
export const tuningLabel = (
  name: string,
  stringIndex: number,
  labels: readonly string[],
): Effect.Effect<string, InvalidTuningName> =>
  Effect.gen(function* () {
    const match = name.match(NOTE_NAME_REGEX)
    const letter = match?.[1]
    if (!letter) {
      return yield* Effect.fail(
        new InvalidTuningName({
          note: name,
          reason: "expected a note letter A-G with optional # or b",
        }),
      )
    }
    const accidental = match?.[2] ?? "-"
    const taken = new Set(labels.filter((_, s) => s !== stringIndex).map(l => l.charAt(0)))

    for (const candidate of [letter, swapCase(letter)]) {
      if (!taken.has(candidate)) {
        return `${candidate}${accidental}|`
      }
    }
    return yield* Effect.fail(
      new InvalidTuningName({ note: name, reason: "both cases are already used by other strings" }),
    )
  })

/**
 * Relabel one string on every staff, then re-learn the tuning of the current staff
 */
export const retuneString = (
  doc: TabDocument,
  ctx: TabContext,
  name: string,
): Effect.Effect<{ readonly document: TabDocument; readonly tuning: Tuning }, InvalidTuningName> =>
  Effect.gen(function* () {
    const current = learnTuning(doc, staffOf(doc, ctx))
    const label = yield* tuningLabel(name, ctx.stringIndex, current.labels)

    let document = doc
    for (const staff of doc.staves) {
      const line = document.stringLine(staff, ctx.stringIndex)
      document = document.withLines(staff.firstLine + ctx.stringIndex, [
        label + line.slice(PREFIX_WIDTH),
      ])
    }

    return { document, tuning: learnTuning(document, staffOf(document, ctx)) }
  })
