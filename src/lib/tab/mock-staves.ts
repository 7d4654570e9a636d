/**
 * Staff builders for tests and demos
 */

import { BLANK_CELL, STRING_COUNT } from "@/constants/tab"
import { formatCell, note } from "./cell"
import { STANDARD_TUNING } from "./tuning"

/** Cell text per string, high string first */
export type StaffCells = readonly (readonly string[])[]

export function staffLine(label: string, cells: readonly string[]): string {
  return `${label}--${cells.join("")}`
}

export function staffLines(
  cells: StaffCells,
  labels: readonly string[] = STANDARD_TUNING.labels,
): string[] {
  return labels.map((label, s) => staffLine(label, cells[s] ?? []))
}

export function blankCells(count: number): StaffCells {
  return Array.from({ length: STRING_COUNT }, () => Array.from({ length: count }, () => BLANK_CELL))
}

/**
 * A staff of `count` blank cells with one chord written at `cellIndex`.
 * `frets` runs high string to low string, null for an unplayed string.
 */
export function chordCells(
  frets: readonly (number | null)[],
  cellIndex: number,
  count: number,
): StaffCells {
  return blankCells(count).map((row, s) =>
    row.map((cell, c) => {
      const fret = frets[s] ?? null
      return c === cellIndex && fret !== null ? formatCell(note(fret)) : cell
    }),
  )
}
