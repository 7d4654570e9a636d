import { describe, expect, it } from "vitest"
import { advance, contextAt, moveStaff, moveStrings, pointOf, resolve } from "./cursor"
import { blankCells, staffLines } from "./mock-staves"
import { TabDocument } from "./tab-document"

const staff = staffLines(blankCells(4))
const doc = TabDocument.fromLines(["title", ...staff])

function at(line: number, column: number) {
  const ctx = resolve(doc, doc.offsetOf(line, column))
  if (!ctx) throw new Error(`no tab context at ${line}:${column}`)
  return ctx
}

describe("resolve", () => {
  it("returns null outside a staff", () => {
    expect(resolve(doc, 2)).toBeNull()
  })

  it("snaps the prefix to the first cell", () => {
    expect(at(3, 0)).toEqual({
      staffIndex: 0,
      stringIndex: 2,
      cellIndex: 0,
      line: 3,
      column: 5,
    })
  })

  it("snaps columns back to the start of their cell", () => {
    expect(at(1, 8).cellIndex).toBe(1)
    expect(at(1, 9).cellIndex).toBe(1)
    expect(at(1, 10).cellIndex).toBe(1)
    expect(at(1, 11).cellIndex).toBe(2)
    expect(at(1, 10).column).toBe(8)
  })

  it("clamps the end of the line to the last cell", () => {
    expect(at(6, 17)).toMatchObject({ stringIndex: 5, cellIndex: 3, column: 14 })
  })

  it("gives the same context when resolved again at its own point", () => {
    const ctx = at(4, 12)
    expect(resolve(doc, pointOf(doc, ctx))).toEqual(ctx)
  })
})

describe("advance", () => {
  it("moves by cells and stops at both ends", () => {
    const ctx = at(1, 8)
    expect(advance(doc, ctx, 1).cellIndex).toBe(2)
    expect(advance(doc, ctx, -5).cellIndex).toBe(0)
    expect(advance(doc, ctx, 10).cellIndex).toBe(3)
  })
})

describe("moveStrings", () => {
  it("wraps around the six strings", () => {
    expect(moveStrings(doc, at(6, 5), 1).stringIndex).toBe(0)
    expect(moveStrings(doc, at(1, 5), -1).stringIndex).toBe(5)
    expect(moveStrings(doc, at(3, 5), 7)).toMatchObject({ stringIndex: 3, line: 4 })
  })
})

describe("moveStaff", () => {
  const twoStaves = TabDocument.fromLines([...staff, "", ...staff])

  it("lands on the top string of the next staff", () => {
    const [first] = twoStaves.staves
    if (!first) throw new Error("expected a staff")
    const target = moveStaff(twoStaves, contextAt(first, 4, 2), "next")
    expect(target).toEqual({ staffIndex: 1, stringIndex: 0, cellIndex: 2, line: 7, column: 11 })
  })

  it("returns null past the first or last staff", () => {
    const [first, second] = twoStaves.staves
    if (!first || !second) throw new Error("expected two staves")
    expect(moveStaff(twoStaves, contextAt(first, 0, 0), "previous")).toBeNull()
    expect(moveStaff(twoStaves, contextAt(second, 0, 0), "next")).toBeNull()
  })
})
