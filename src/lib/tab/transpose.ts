/**
 * Transposition and retuning of fretted notes
 */

import { MAX_FRET, OCTAVE, PREFIX_WIDTH, STRING_COUNT } from "@/constants/tab"
import { Effect } from "effect"
import { note } from "./cell"
import { type TabContext, contextAt, pointOf, staffOf } from "./cursor"
import type { TabEdit } from "./staff-editor"
import { InvalidTransposition, RegionSpansMultipleStaves } from "./tab-errors"
import { type Staff, type TabDocument, cellCount, lastLine } from "./tab-document"
import { type Tuning, learnTuning, normalizePitch } from "./tuning"

// Frets above the neck fold into the top octave, 13..24
const TOP_OCTAVE_START = MAX_FRET - OCTAVE + 1

/**
 * Shift a fret, folding back by whole octaves until it lands on the neck
 */
export function shiftFret(fret: number, delta: number): number {
  const shifted = fret + delta
  if (shifted < 0) return normalizePitch(shifted)
  if (shifted > MAX_FRET) return TOP_OCTAVE_START + normalizePitch(shifted - TOP_OCTAVE_START)
  return shifted
}

function transposeCells(
  doc: TabDocument,
  staff: Staff,
  firstCell: number,
  lastCell: number,
  deltas: readonly number[],
): TabDocument {
  let document = doc
  for (let s = 0; s < STRING_COUNT; s++) {
    const delta = deltas[s] ?? 0
    if (delta === 0) continue
    for (let c = firstCell; c <= lastCell; c++) {
      const cell = document.cell(staff, s, c)
      if (cell._tag !== "Note") continue
      const shifted = note(shiftFret(cell.fret, delta), cell.embellishment)
      document = document.withCell(staff, s, c, shifted)
    }
  }
  return document
}

/**
 * Transpose every note between two contexts, each string by its own delta
 */
export const transposeRegion = (
  doc: TabDocument,
  begin: TabContext,
  end: TabContext,
  deltas: readonly number[],
): Effect.Effect<TabDocument, RegionSpansMultipleStaves | InvalidTransposition> =>
  Effect.gen(function* () {
    const invalid = deltas.find(delta => !Number.isSafeInteger(delta))
    if (invalid !== undefined) {
      return yield* Effect.fail(new InvalidTransposition({ semitones: invalid }))
    }
    if (begin.staffIndex !== end.staffIndex) {
      return yield* Effect.fail(
        new RegionSpansMultipleStaves({ beginStaff: begin.staffIndex, endStaff: end.staffIndex }),
      )
    }
    const staff = staffOf(doc, begin)
    return transposeCells(
      doc,
      staff,
      Math.min(begin.cellIndex, end.cellIndex),
      Math.max(begin.cellIndex, end.cellIndex),
      deltas,
    )
  })

export const transposeUniform = (
  doc: TabDocument,
  begin: TabContext,
  end: TabContext,
  semitones: number,
): Effect.Effect<TabDocument, RegionSpansMultipleStaves | InvalidTransposition> =>
  transposeRegion(doc, begin, end, Array.from({ length: STRING_COUNT }, () => semitones))

/**
 * Per-string fret deltas that re-render shapes written in `from` for `to`.
 * Each delta is the smaller move, in (-6, 6].
 */
export function retuneDeltas(from: Tuning, to: Tuning): number[] {
  return Array.from({ length: STRING_COUNT }, (_, s) => {
    const diff = normalizePitch((from.pitches[s] ?? 0) - (to.pitches[s] ?? 0))
    return diff > OCTAVE / 2 ? diff - OCTAVE : diff
  })
}

/**
 * Copy a staff below the first blank line after it, relabelled and
 * transposed so the same pitches sound in the `current` tuning.
 */
export function copyRetune(doc: TabDocument, source: TabContext, current: Tuning): TabEdit {
  const staff = staffOf(doc, source)
  const original = learnTuning(doc, staff)

  let blankLine = doc.lines.findIndex((line, i) => i > lastLine(staff) && line.trim() === "")
  let document = doc
  if (blankLine === -1) {
    blankLine = doc.lines.length
    document = document.insertLines(blankLine, [""])
  }

  const copy = Array.from(
    { length: STRING_COUNT },
    (_, s) => (current.labels[s] ?? "") + doc.stringLine(staff, s).slice(PREFIX_WIDTH),
  )
  const insertAt = blankLine + 1
  const following = document.lines[insertAt]
  const inserted = following !== undefined && following.trim() !== "" ? [...copy, ""] : copy
  document = document.insertLines(insertAt, inserted)

  const target = document.staffAtLine(insertAt)
  if (!target) {
    return { document, point: document.offsetOf(insertAt, 0) }
  }
  document = transposeCells(
    document,
    target,
    0,
    cellCount(target.width) - 1,
    retuneDeltas(original, current),
  )
  return { document, point: pointOf(document, contextAt(target, 0, 0)) }
}
