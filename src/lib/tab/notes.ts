import { MAX_FRET, OCTAVE } from "@/constants/tab"
import { Effect } from "effect"
import { BLANK, type EmbKind, note } from "./cell"
import { type TabContext, staffOf } from "./cursor"
import { FretOutOfRange } from "./tab-errors"
import type { TabDocument } from "./tab-document"

export type OctaveDirection = "up" | "down"

/**
 * Write a fretted note on the cursor string. Barline columns are left alone
 * so the barline stays intact across all six strings.
 */
export const placeNote = (
  doc: TabDocument,
  ctx: TabContext,
  fret: number,
  embellishment: EmbKind = "Normal",
): Effect.Effect<TabDocument, FretOutOfRange> =>
  Effect.gen(function* () {
    if (!Number.isInteger(fret) || fret < 0 || fret > MAX_FRET) {
      return yield* Effect.fail(new FretOutOfRange({ fret }))
    }
    const staff = staffOf(doc, ctx)
    if (doc.cell(staff, ctx.stringIndex, ctx.cellIndex)._tag === "Barline") {
      return doc
    }
    return doc.withCell(staff, ctx.stringIndex, ctx.cellIndex, note(fret, embellishment))
  })

export function clearNote(doc: TabDocument, ctx: TabContext): TabDocument {
  const staff = staffOf(doc, ctx)
  const cell = doc.cell(staff, ctx.stringIndex, ctx.cellIndex)
  if (cell._tag === "Barline" || cell._tag === "Blank") return doc
  return doc.withCell(staff, ctx.stringIndex, ctx.cellIndex, BLANK)
}

/**
 * Toggle an embellishment on the note under the cursor.
 * Returns null when there is no note there.
 */
export function toggleEmbellishment(
  doc: TabDocument,
  ctx: TabContext,
  kind: EmbKind,
): TabDocument | null {
  const staff = staffOf(doc, ctx)
  const cell = doc.cell(staff, ctx.stringIndex, ctx.cellIndex)
  if (cell._tag !== "Note") return null

  const embellishment = cell.embellishment === kind ? "Normal" : kind
  return doc.withCell(staff, ctx.stringIndex, ctx.cellIndex, note(cell.fret, embellishment))
}

/**
 * Move the note under the cursor an octave. Out-of-range requests do nothing.
 */
export function octaveShift(
  doc: TabDocument,
  ctx: TabContext,
  direction: OctaveDirection,
): TabDocument {
  const staff = staffOf(doc, ctx)
  const cell = doc.cell(staff, ctx.stringIndex, ctx.cellIndex)
  if (cell._tag !== "Note") return doc

  const shift =
    direction === "up" && cell.fret <= OCTAVE
      ? OCTAVE
      : direction === "down" && cell.fret >= OCTAVE
        ? -OCTAVE
        : 0
  if (shift === 0) return doc

  const shifted = note(cell.fret + shift, cell.embellishment)
  return doc.withCell(staff, ctx.stringIndex, ctx.cellIndex, shifted)
}
