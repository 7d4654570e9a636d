import { type TabDocument, cellColumn, isStringLine } from "@/lib/tab/tab-document"
import type { ChordAnalysis } from "./chord-analyzer"

/**
 * Blank out the run of non-space characters starting at `column`
 */
function eraseLabel(line: string, column: number): string {
  let end = column
  while (end < line.length && line.charAt(end) !== " ") {
    end++
  }
  return line.slice(0, column) + " ".repeat(end - column) + line.slice(end)
}

function writeLabel(line: string, column: number, name: string): string {
  const padded = line.padEnd(column, " ")
  return padded.slice(0, column) + name + padded.slice(column + name.length)
}

/**
 * Write the analyzed chord name on the line above its staff, aligned with the
 * analyzed column. A label line is inserted when the staff has none.
 */
export function labelChord(doc: TabDocument, analysis: ChordAnalysis): TabDocument {
  const staff = doc.staff(analysis.staffIndex)
  if (!staff) return doc

  let document = doc
  let labelLine = staff.firstLine - 1
  if (labelLine < 0 || isStringLine(document.line(labelLine))) {
    labelLine = staff.firstLine
    document = document.insertLines(labelLine, [""])
  }

  const column = cellColumn(analysis.cellIndex)
  const erased = eraseLabel(document.line(labelLine), column)
  return document.withLines(labelLine, [writeLabel(erased, column, analysis.chordName)])
}
