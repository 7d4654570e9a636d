/**
 * Staff editor
 *
 * Column-wise edits that keep all six string-lines of a staff aligned.
 * Staff width is fixed: anything pushed past the right edge is cropped, and
 * anything removed is padded back with blank dashes on the right.
 */

import { BLANK_CELL, CELL_WIDTH, STRING_COUNT } from "@/constants/tab"
import { Effect } from "effect"
import { BARLINE, BLANK } from "./cell"
import { type TabContext, contextAt, pointOf, staffOf } from "./cursor"
import { EmptyClipboard, RegionSpansMultipleStaves } from "./tab-errors"
import { type TabDocument, cellCount, cellColumn, lastLine } from "./tab-document"
import type { Tuning } from "./tuning"

export interface TabEdit {
  readonly document: TabDocument
  readonly point: number
}

/**
 * Rectangular clipboard: one row per string, all the same width
 */
export interface TabClipboard {
  readonly rows: readonly string[]
}

export type DeleteDirection = "forward" | "backward"

function insertCropped(line: string, column: number, text: string): string {
  return (line.slice(0, column) + text + line.slice(column)).slice(0, line.length)
}

function removePadded(line: string, column: number, width: number): string {
  const removed = line.slice(0, column) + line.slice(column + width)
  return removed.padEnd(line.length, "-")
}

function editAt(doc: TabDocument, ctx: TabContext): TabEdit {
  return { document: doc, point: pointOf(doc, ctx) }
}

export function blankStringLine(label: string, width: number): string {
  return `${label}--${BLANK_CELL.repeat(cellCount(width))}`
}

/**
 * Insert a new staff (with a blank label line above it) below the nearest
 * staff at or above the point, or three lines below the point when none.
 */
export function makeStaff(doc: TabDocument, point: number, width: number, tuning: Tuning): TabEdit {
  const { line } = doc.locate(point)
  const preceding = doc.staves.filter(s => s.firstLine <= line).at(-1)
  const following = doc.staves.find(s => s.firstLine > line)
  const inserted = ["", ...tuning.labels.map(label => blankStringLine(label, width))]

  let insertAt = preceding ? lastLine(preceding) + 1 : line + 2
  if (!preceding && following && following.firstLine <= insertAt) {
    // Keep the staff below from running into the new one
    insertAt = following.firstLine
    inserted.push("")
  }

  const document = doc.insertLines(insertAt, inserted)
  const staff = document.staffAtLine(insertAt + 1)
  if (!staff) {
    return { document, point: document.offsetOf(insertAt + 1, 0) }
  }
  return editAt(document, contextAt(staff, 0, 0))
}

export function insertColumns(doc: TabDocument, ctx: TabContext, count: number): TabEdit {
  const staff = staffOf(doc, ctx)
  const blanks = BLANK_CELL.repeat(Math.max(0, count))
  const document = doc.mapStrings(staff, line => insertCropped(line, ctx.column, blanks))
  return editAt(document, ctx)
}

export function deleteCells(
  doc: TabDocument,
  ctx: TabContext,
  count: number,
  direction: DeleteDirection,
): TabEdit {
  const staff = staffOf(doc, ctx)
  const requested = Math.max(0, count)
  const cells = direction === "backward" ? Math.min(requested, ctx.cellIndex) : requested
  const startCell = direction === "backward" ? ctx.cellIndex - cells : ctx.cellIndex
  const column = cellColumn(startCell)

  const document = doc.mapStrings(staff, line => removePadded(line, column, cells * CELL_WIDTH))
  return editAt(document, contextAt(staff, ctx.stringIndex, startCell))
}

/**
 * Flip the cursor column between a barline and blank on all six strings
 */
export function toggleBarline(doc: TabDocument, ctx: TabContext, advanceCursor: boolean): TabEdit {
  const staff = staffOf(doc, ctx)
  const cell = doc.cell(staff, ctx.stringIndex, ctx.cellIndex)._tag === "Barline" ? BLANK : BARLINE

  let document = doc
  for (let s = 0; s < STRING_COUNT; s++) {
    document = document.withCell(staff, s, ctx.cellIndex, cell)
  }

  if (!advanceCursor) return editAt(document, ctx)

  if (ctx.cellIndex + 1 < cellCount(staff.width)) {
    return editAt(document, contextAt(staff, ctx.stringIndex, ctx.cellIndex + 1))
  }
  return { document, point: document.offsetOf(ctx.line, ctx.column + 2) }
}

/**
 * Copy the rectangle between two contexts of one staff into a clipboard,
 * optionally removing it from the staff.
 */
export const killRegion = (
  doc: TabDocument,
  begin: TabContext,
  end: TabContext,
  deleteSource: boolean,
): Effect.Effect<
  { readonly edit: TabEdit; readonly clipboard: TabClipboard },
  RegionSpansMultipleStaves
> =>
  Effect.gen(function* () {
    if (begin.staffIndex !== end.staffIndex) {
      return yield* Effect.fail(
        new RegionSpansMultipleStaves({ beginStaff: begin.staffIndex, endStaff: end.staffIndex }),
      )
    }
    const staff = staffOf(doc, begin)
    const firstCell = Math.min(begin.cellIndex, end.cellIndex)
    const column = cellColumn(firstCell)
    const width = (Math.abs(begin.cellIndex - end.cellIndex) + 1) * CELL_WIDTH

    const rows = Array.from({ length: STRING_COUNT }, (_, s) =>
      doc.stringLine(staff, s).slice(column, column + width).padEnd(width, "-"),
    )
    const document = deleteSource
      ? doc.mapStrings(staff, line => removePadded(line, column, width))
      : doc

    return {
      edit: editAt(document, contextAt(staff, begin.stringIndex, firstCell)),
      clipboard: { rows },
    }
  })

/**
 * Insert the clipboard rectangle at the cursor column, cropping at the right edge
 */
export const yank = (
  doc: TabDocument,
  ctx: TabContext,
  clipboard: TabClipboard | null,
): Effect.Effect<TabEdit, EmptyClipboard> =>
  Effect.gen(function* () {
    if (!clipboard || clipboard.rows.length !== STRING_COUNT) {
      return yield* Effect.fail(new EmptyClipboard())
    }
    const staff = staffOf(doc, ctx)
    const document = doc.mapStrings(staff, (line, s) =>
      insertCropped(line, ctx.column, clipboard.rows[s] ?? ""),
    )
    return editAt(document, ctx)
  })
