import { CELL_WIDTH, FIRST_CELL_COLUMN, STRING_COUNT } from "@/constants/tab"
import { type Cell, formatCell, parseCell } from "./cell"

/**
 * A six-string block of tablature located in the document
 */
export interface Staff {
  readonly index: number
  /** Line number of string 0 (the highest string) */
  readonly firstLine: number
  /** Length of the first string-line; every string-line of the staff shares it */
  readonly width: number
}

export interface LinePosition {
  readonly line: number
  readonly column: number
}

const STRING_LINE_REGEX = /^[A-Ga-g][#b-]\|/

export function isStringLine(line: string): boolean {
  return STRING_LINE_REGEX.test(line)
}

export function cellCount(width: number): number {
  return Math.max(0, Math.floor((width - FIRST_CELL_COLUMN) / CELL_WIDTH))
}

export function cellColumn(cellIndex: number): number {
  return FIRST_CELL_COLUMN + cellIndex * CELL_WIDTH
}

export function lastLine(staff: Staff): number {
  return staff.firstLine + STRING_COUNT - 1
}

function hasDistinctPrefixes(lines: readonly string[]): boolean {
  const firstChars = new Set(lines.map(line => line.charAt(0)))
  return firstChars.size === lines.length
}

/**
 * Scan top-down for runs of six string-lines whose first characters are
 * pairwise distinct. A matched run claims its lines.
 */
function findStaves(lines: readonly string[]): Staff[] {
  const staves: Staff[] = []
  let i = 0
  while (i + STRING_COUNT <= lines.length) {
    const block = lines.slice(i, i + STRING_COUNT)
    if (block.every(isStringLine) && hasDistinctPrefixes(block)) {
      staves.push({ index: staves.length, firstLine: i, width: block[0]?.length ?? 0 })
      i += STRING_COUNT
    } else {
      i++
    }
  }
  return staves
}

/**
 * Immutable view over the host's text as lines, with the staves it contains.
 * Every edit returns a new document; the original is never touched.
 */
export class TabDocument {
  private stavesCache: readonly Staff[] | null = null

  private constructor(readonly lines: readonly string[]) {}

  static fromText(text: string): TabDocument {
    return new TabDocument(text.split("\n"))
  }

  static fromLines(lines: readonly string[]): TabDocument {
    return new TabDocument(lines.length === 0 ? [""] : [...lines])
  }

  toText(): string {
    return this.lines.join("\n")
  }

  get staves(): readonly Staff[] {
    if (this.stavesCache === null) {
      this.stavesCache = findStaves(this.lines)
    }
    return this.stavesCache
  }

  line(index: number): string {
    return this.lines[index] ?? ""
  }

  staffAtLine(line: number): Staff | null {
    return this.staves.find(s => line >= s.firstLine && line <= lastLine(s)) ?? null
  }

  staff(index: number): Staff | null {
    return this.staves[index] ?? null
  }

  stringLine(staff: Staff, stringIndex: number): string {
    return this.line(staff.firstLine + stringIndex)
  }

  cell(staff: Staff, stringIndex: number, cellIndex: number): Cell {
    const column = cellColumn(cellIndex)
    return parseCell(this.stringLine(staff, stringIndex).slice(column, column + CELL_WIDTH))
  }

  /**
   * Raw offset of a line/column pair, with the column clamped to the line
   */
  offsetOf(line: number, column: number): number {
    const target = Math.max(0, Math.min(line, this.lines.length - 1))
    let offset = 0
    for (let i = 0; i < target; i++) {
      offset += this.line(i).length + 1
    }
    return offset + Math.max(0, Math.min(column, this.line(target).length))
  }

  locate(offset: number): LinePosition {
    let remaining = Math.max(0, offset)
    for (let line = 0; line < this.lines.length; line++) {
      const length = this.line(line).length
      if (remaining <= length) {
        return { line, column: remaining }
      }
      remaining -= length + 1
    }
    const last = this.lines.length - 1
    return { line: last, column: this.line(last).length }
  }

  withLines(start: number, replacement: readonly string[]): TabDocument {
    const next = [...this.lines]
    next.splice(start, replacement.length, ...replacement)
    return new TabDocument(next)
  }

  insertLines(at: number, inserted: readonly string[]): TabDocument {
    const next = [...this.lines]
    while (next.length < at) {
      next.push("")
    }
    next.splice(at, 0, ...inserted)
    return new TabDocument(next)
  }

  /**
   * Apply `edit` to each of the staff's six string-lines
   */
  mapStrings(staff: Staff, edit: (line: string, stringIndex: number) => string): TabDocument {
    const rows = Array.from({ length: STRING_COUNT }, (_, s) => edit(this.stringLine(staff, s), s))
    return this.withLines(staff.firstLine, rows)
  }

  withCell(staff: Staff, stringIndex: number, cellIndex: number, cell: Cell): TabDocument {
    const column = cellColumn(cellIndex)
    const line = this.stringLine(staff, stringIndex)
    const updated = line.slice(0, column) + formatCell(cell) + line.slice(column + CELL_WIDTH)
    return this.withLines(staff.firstLine + stringIndex, [updated])
  }
}
