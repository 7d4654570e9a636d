import { contextAt } from "@/lib/tab/cursor"
import { chordCells, staffLines } from "@/lib/tab/mock-staves"
import { TabDocument } from "@/lib/tab/tab-document"
import { STANDARD_TUNING } from "@/lib/tab/tuning"
import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import {
  type ChordFrets,
  analyzeChord,
  analyzeFrets,
  formatChordMessage,
  intervalSet,
} from "./chord-analyzer"
import { buildPatternTable } from "./chord-patterns"

// Frets run high string to low string
const A_MAJOR: ChordFrets = [0, 2, 2, 2, 0, null]
const A_MINOR: ChordFrets = [0, 1, 2, 2, 0, null]
const C_OVER_F_SHARP: ChordFrets = [0, 1, 0, 2, 3, 2]

const location = { staffIndex: 0, cellIndex: 0 }

const analyze = (frets: ChordFrets, rootString: number, twelveToneSpelling = false) =>
  analyzeFrets(frets, STANDARD_TUNING, rootString, location, { twelveToneSpelling })

describe("intervalSet", () => {
  it("lists distinct intervals above the root in order", () => {
    expect(intervalSet([5, 0, 9, 0, 5], 5)).toEqual([4, 7])
    expect(intervalSet([8], 8)).toEqual([])
  })
})

describe("analyzeFrets", () => {
  it("names a major chord", () => {
    expect(analyze(A_MAJOR, 4)).toMatchObject({
      rootString: 4,
      rootPitch: 5,
      chordName: "A",
      disclaimer: "",
      spelling: "5 3 rt 5 rt x",
    })
  })

  it("names a minor chord", () => {
    expect(analyze(A_MINOR, 4)).toMatchObject({ chordName: "Am", spelling: "5 b3 rt 5 rt x" })
  })

  it("falls back to a slash chord over a single bass note", () => {
    expect(analyze(C_OVER_F_SHARP, 4)).toMatchObject({
      chordName: "C/F#",
      disclaimer: "",
      spelling: "3 rt 5 3 rt b5",
    })
  })

  it("reports unknown sets with question marks", () => {
    expect(analyze(A_MAJOR, 0)).toMatchObject({
      chordName: "E??",
      disclaimer: "",
      spelling: "rt 6 4 rt 4 x",
    })
  })

  it("prefers 7sus4 over 11 for the same notes", () => {
    expect(analyze([0, 3, 0, 2, 0, null], 4).chordName).toBe("A7sus4")
  })

  it("uses the table it is given", () => {
    const table = buildPatternTable([
      { noteCount: 4, intervals: [5, 7, 10], name: "11", disclaimer: ",no3,no9" },
    ])
    const analysis = analyzeFrets([0, 3, 0, 2, 0, null], STANDARD_TUNING, 4, location, { table })
    expect(analysis.chordName).toBe("A11")
    expect(analysis.disclaimer).toBe(",no3,no9")
  })

  it("spells with the pattern's degree names", () => {
    expect(analyze([0, 3, 0, 2, 3, null], 4)).toMatchObject({
      chordName: "Cadd9",
      spelling: "3 9 5 3 rt x",
    })
  })

  it("names a single note with the wildcard", () => {
    expect(analyze([null, null, null, null, 3, null], 4)).toMatchObject({
      chordName: "C",
      disclaimer: ",no3,no5",
      spelling: "x x x x rt x",
    })
  })

  it("appends semitones low to high for twelve-tone spelling", () => {
    expect(analyze(A_MAJOR, 4, true).spelling).toBe("5 3 rt 5 rt x (x 0 7 0 4 7)")
  })
})

describe("formatChordMessage", () => {
  it("joins name, disclaimer and spelling", () => {
    expect(formatChordMessage(analyze([0, null, 0, null, 0, null], 4))).toBe("A7no3  5 x 7 x rt x")
  })
})

describe("analyzeChord", () => {
  const doc = TabDocument.fromLines(["", ...staffLines(chordCells(A_MAJOR, 1, 4))])
  const staff = doc.staff(0)
  if (!staff) throw new Error("expected a staff")

  it("roots the chord on the cursor string", () => {
    const analysis = Effect.runSync(
      analyzeChord(doc, contextAt(staff, 4, 1), STANDARD_TUNING, null),
    )
    expect(analysis).toMatchObject({ staffIndex: 0, cellIndex: 1, rootString: 4, chordName: "A" })
  })

  it("moves the root on when repeated on the same column", () => {
    const ctx = contextAt(staff, 4, 1)
    const first = Effect.runSync(analyzeChord(doc, ctx, STANDARD_TUNING, null))
    const second = Effect.runSync(analyzeChord(doc, ctx, STANDARD_TUNING, first))
    expect(second).toMatchObject({ rootString: 0, chordName: "E??" })
    const third = Effect.runSync(analyzeChord(doc, ctx, STANDARD_TUNING, second))
    expect(third).toMatchObject({ rootString: 1, chordName: "C#??" })
  })

  it("starts over on a different column", () => {
    const previous = Effect.runSync(
      analyzeChord(doc, contextAt(staff, 4, 1), STANDARD_TUNING, null),
    )
    const error = Effect.runSync(
      Effect.flip(analyzeChord(doc, contextAt(staff, 4, 2), STANDARD_TUNING, previous)),
    )
    expect(error._tag).toBe("NoNotesInChord")
    expect([error.staffIndex, error.cellIndex]).toEqual([0, 2])
  })

  it("searches past an empty cursor string", () => {
    const analysis = Effect.runSync(
      analyzeChord(doc, contextAt(staff, 5, 1), STANDARD_TUNING, null),
    )
    expect(analysis.rootString).toBe(0)
  })
})
