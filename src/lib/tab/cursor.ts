/**
 * Cursor model
 *
 * Maps raw text offsets to validated (staff, string, cell) positions. This is
 * the single place that decides whether the point is inside tab at all.
 */

import { CELL_WIDTH, FIRST_CELL_COLUMN, STRING_COUNT } from "@/constants/tab"
import { StaleTabContext } from "./tab-errors"
import { type Staff, type TabDocument, cellColumn, cellCount } from "./tab-document"

/**
 * A validated position inside one staff. Contexts are only meaningful for the
 * document they came from: take them from `resolve`, `contextAt` or a cursor
 * move on that document, and re-resolve after every edit.
 */
export interface TabContext {
  readonly staffIndex: number
  /** 0 = highest string (top line), 5 = lowest */
  readonly stringIndex: number
  readonly cellIndex: number
  /** Absolute line number of the string-line */
  readonly line: number
  /** Column of the cell start, always `5 + 3 * cellIndex` */
  readonly column: number
}

export type StaffDirection = "next" | "previous"

function clampCell(staff: Staff, cellIndex: number): number {
  const lastCell = Math.max(0, cellCount(staff.width) - 1)
  return Math.max(0, Math.min(cellIndex, lastCell))
}

function snapColumn(column: number): number {
  if (column < FIRST_CELL_COLUMN) return 0
  return Math.floor((column - FIRST_CELL_COLUMN) / CELL_WIDTH)
}

/**
 * Build a context from indices, clamping the cell into the staff
 */
export function contextAt(staff: Staff, stringIndex: number, cellIndex: number): TabContext {
  const cell = clampCell(staff, cellIndex)
  return {
    staffIndex: staff.index,
    stringIndex,
    cellIndex: cell,
    line: staff.firstLine + stringIndex,
    column: cellColumn(cell),
  }
}

/**
 * Resolve a raw offset to a tab position, or null when the point is outside tab.
 * Resolving twice at the same offset always yields the same context.
 */
export function resolve(doc: TabDocument, point: number): TabContext | null {
  const { line, column } = doc.locate(point)
  const staff = doc.staffAtLine(line)
  if (!staff) return null
  return contextAt(staff, line - staff.firstLine, snapColumn(column))
}

export function pointOf(doc: TabDocument, ctx: TabContext): number {
  return doc.offsetOf(ctx.line, ctx.column)
}

/**
 * Staff a context points into. Throws `StaleTabContext` when the document has
 * no such staff; every editor that takes a context goes through here.
 */
export function staffOf(doc: TabDocument, ctx: TabContext): Staff {
  const staff = doc.staff(ctx.staffIndex)
  if (!staff) {
    throw new StaleTabContext({ staffIndex: ctx.staffIndex })
  }
  return staff
}

/**
 * Move along the line by whole cells, stopping at the first and last cell
 */
export function advance(doc: TabDocument, ctx: TabContext, deltaCells: number): TabContext {
  return contextAt(staffOf(doc, ctx), ctx.stringIndex, ctx.cellIndex + deltaCells)
}

/**
 * Move across strings of the same staff, wrapping 5 -> 0 and 0 -> 5
 */
export function moveStrings(doc: TabDocument, ctx: TabContext, deltaStrings: number): TabContext {
  const shifted = (ctx.stringIndex + deltaStrings) % STRING_COUNT
  const stringIndex = (shifted + STRING_COUNT) % STRING_COUNT
  return contextAt(staffOf(doc, ctx), stringIndex, ctx.cellIndex)
}

/**
 * Jump to string 0 of the adjacent staff, keeping the cell where it fits.
 * Returns null when there is no staff in that direction.
 */
export function moveStaff(
  doc: TabDocument,
  ctx: TabContext,
  direction: StaffDirection,
): TabContext | null {
  const target = doc.staff(direction === "next" ? ctx.staffIndex + 1 : ctx.staffIndex - 1)
  if (!target) return null
  return contextAt(target, 0, ctx.cellIndex)
}
