import { blankCells, staffLines } from "@/lib/tab/mock-staves"
import { TabDocument } from "@/lib/tab/tab-document"
import { describe, expect, it } from "vitest"
import type { ChordAnalysis } from "./chord-analyzer"
import { labelChord } from "./chord-label"

const staff = staffLines(blankCells(4))

function analysis(chordName: string, cellIndex: number, staffIndex = 0): ChordAnalysis {
  return {
    staffIndex,
    cellIndex,
    rootString: 4,
    rootPitch: 5,
    chordName,
    disclaimer: "",
    spelling: "",
  }
}

describe("labelChord", () => {
  it("writes the name above the analyzed column", () => {
    const doc = TabDocument.fromLines(["", ...staff])
    const labelled = labelChord(doc, analysis("Am", 1))
    expect(labelled.line(0)).toBe("        Am")
    expect(labelled.lines.slice(1)).toEqual(staff)
  })

  it("replaces an existing label in the same column", () => {
    const doc = TabDocument.fromLines(["        Dsus4 x", ...staff])
    expect(labelChord(doc, analysis("Am", 1)).line(0)).toBe("        Am    x")
  })

  it("only overwrites as many columns as the new name needs", () => {
    const doc = TabDocument.fromLines(["        C7   G", ...staff])
    expect(labelChord(doc, analysis("A", 1)).line(0)).toBe("        A    G")
  })

  it("keeps labels of other columns", () => {
    const doc = TabDocument.fromLines(["     G", ...staff])
    expect(labelChord(doc, analysis("D", 2)).line(0)).toBe("     G     D")
  })

  it("inserts a label line for a staff at the top of the text", () => {
    const labelled = labelChord(TabDocument.fromLines(staff), analysis("E", 0))
    expect(labelled.lines).toEqual(["     E", ...staff])
    expect(labelled.staves[0]?.firstLine).toBe(1)
  })

  it("inserts a label line between two adjacent staves", () => {
    const doc = TabDocument.fromLines([...staff, ...staff])
    const labelled = labelChord(doc, analysis("G", 3, 1))
    expect(labelled.line(6)).toBe("              G")
    expect(labelled.staves.map(s => s.firstLine)).toEqual([0, 7])
  })
})
