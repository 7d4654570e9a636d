import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { formatErrorForLog, setTabDebug, tabLog } from "./tab-log"
import { FretOutOfRange } from "./tab-errors"

describe("tabLog", () => {
  beforeEach(() => {
    setTabDebug(null)
  })

  afterEach(() => {
    setTabDebug(null)
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it("writes a tagged line when TAB_DEBUG is on", () => {
    vi.stubEnv("TAB_DEBUG", "true")
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    tabLog("command", "PlaceNote applied", { point: 3 })
    expect(log).toHaveBeenCalledTimes(1)
    expect(log.mock.calls[0]?.[0]).toMatch(
      /^\[TAB \d\d:\d\d:\d\d\.\d{3}\] \[command\] PlaceNote applied \{"point":3\}$/,
    )
  })

  it("stays quiet when TAB_DEBUG is off", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    tabLog("command", "PlaceNote applied")
    expect(log).not.toHaveBeenCalled()
  })

  it("does not throw on malformed settings", () => {
    vi.stubEnv("TAB_DEBUG", "loud")
    vi.stubEnv("TAB_STAFF_WIDTH", "wide")
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    expect(() => tabLog("command", "MoveCell applied")).not.toThrow()
    expect(log).not.toHaveBeenCalled()
  })

  it("honours an explicit override", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    setTabDebug(true)
    tabLog("session", "created")
    expect(log.mock.calls[0]?.[0]).toMatch(/\] \[session\] created$/)
  })
})

describe("formatErrorForLog", () => {
  it("renders tagged errors by tag", () => {
    expect(formatErrorForLog(new FretOutOfRange({ fret: 30 }))).toMatch(/^FretOutOfRange: /)
  })

  it("renders plain errors by name and message", () => {
    expect(formatErrorForLog(new TypeError("bad"))).toBe("TypeError: bad")
  })
})
