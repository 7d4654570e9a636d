import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { contextAt } from "./cursor"
import { blankCells, staffLines } from "./mock-staves"
import { TabDocument } from "./tab-document"
import {
  STANDARD_TUNING,
  labelPitch,
  learnTuning,
  pitchName,
  retuneString,
  tuningLabel,
} from "./tuning"

const staff = staffLines(blankCells(2))

describe("labelPitch", () => {
  it("reads letters and accidentals counted from E", () => {
    expect(labelPitch("e-|")).toBe(0)
    expect(labelPitch("E-|")).toBe(0)
    expect(labelPitch("F#|")).toBe(2)
    expect(labelPitch("Bb|")).toBe(6)
    expect(labelPitch("C-|")).toBe(8)
    expect(labelPitch("Eb|")).toBe(11)
  })
})

describe("pitchName", () => {
  it("names pitch classes with sharps", () => {
    expect(pitchName(0)).toBe("E")
    expect(pitchName(2)).toBe("F#")
    expect(pitchName(8)).toBe("C")
    expect(pitchName(-1)).toBe("D#")
    expect(pitchName(17)).toBe("A")
  })
})

describe("learnTuning", () => {
  it("reads standard tuning from its labels", () => {
    const doc = TabDocument.fromLines(staff)
    const [found] = doc.staves
    if (!found) throw new Error("expected a staff")
    expect(learnTuning(doc, found)).toEqual(STANDARD_TUNING)
  })
})

describe("tuningLabel", () => {
  const labels = STANDARD_TUNING.labels

  it("keeps the letter when it is free", () => {
    expect(Effect.runSync(tuningLabel("F#", 2, labels))).toBe("F#|")
  })

  it("flips case to avoid another string's letter", () => {
    expect(Effect.runSync(tuningLabel("D", 5, labels))).toBe("d-|")
    expect(Effect.runSync(tuningLabel("Eb", 0, labels))).toBe("eb|")
  })

  it("fails when both cases are taken", () => {
    const error = Effect.runSync(Effect.flip(tuningLabel("e", 1, labels)))
    expect(error.reason).toBe("both cases are already used by other strings")
  })

  it("fails on names that are not notes", () => {
    for (const name of ["H", "C##", "", "Am"]) {
      const error = Effect.runSync(Effect.flip(tuningLabel(name, 0, labels)))
      expect(error).toBeInstanceOf(Error)
      expect(error.note).toBe(name)
    }
  })
})

describe("retuneString", () => {
  it("relabels the string on every staff and re-learns the tuning", () => {
    const doc = TabDocument.fromLines([...staff, "", ...staff])
    const [first] = doc.staves
    if (!first) throw new Error("expected a staff")

    const { document, tuning } = Effect.runSync(retuneString(doc, contextAt(first, 5, 0), "D"))
    expect(document.line(5)).toBe("d-|--------")
    expect(document.line(12)).toBe("d-|--------")
    expect(document.line(4)).toBe("A-|--------")
    expect(tuning.pitches).toEqual([0, 7, 3, 10, 5, 10])
    expect(tuning.labels[5]).toBe("d-|")
  })

  it("keeps the staff recognizable after retuning", () => {
    const doc = TabDocument.fromLines(staff)
    const [first] = doc.staves
    if (!first) throw new Error("expected a staff")
    const { document } = Effect.runSync(retuneString(doc, contextAt(first, 0, 0), "D"))
    expect(document.line(0)).toBe("d-|--------")
    expect(document.staves).toHaveLength(1)
  })
})
