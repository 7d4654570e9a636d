import type { ChordAnalysis } from "@/lib/chords/chord-analyzer"
import type { EmbKind } from "@/lib/tab/cell"
import type { TabClipboard } from "@/lib/tab/staff-editor"
import { STANDARD_TUNING, type Tuning } from "@/lib/tab/tuning"
import { type EntryMode, type TabConfigValues, loadTabConfig } from "@/services/tab-config"

/**
 * Per-document editing state shared by every command
 */
export interface TabSessionState {
  readonly tuning: Tuning
  readonly clipboard: TabClipboard | null
  /** Applied to the next note entered on a blank cell, then cleared */
  readonly pendingEmbellishment: EmbKind | null
  readonly entryMode: EntryMode
  readonly staffWidth: number
  readonly twelveToneSpelling: boolean
  /** Analysis waiting for a label, or for a repeat that advances the root */
  readonly pendingChord: ChordAnalysis | null
  /** Tag of the most recently dispatched command */
  readonly lastCommand: string | null
}

export function initialSessionState(config: TabConfigValues): TabSessionState {
  return {
    tuning: STANDARD_TUNING,
    clipboard: null,
    pendingEmbellishment: null,
    entryMode: config.entryMode,
    staffWidth: config.staffWidth,
    twelveToneSpelling: config.twelveToneSpelling,
    pendingChord: null,
    lastCommand: null,
  }
}

/**
 * TabSession - one per open document
 *
 * Observable store in the same shape as the app's other stores, so a host
 * UI can subscribe to tuning or clipboard changes.
 */
export class TabSession {
  private listeners = new Set<() => void>()
  private state: TabSessionState

  constructor(config: TabConfigValues = loadTabConfig()) {
    this.state = initialSessionState(config)
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  getSnapshot = (): TabSessionState => this.state

  private notify(): void {
    for (const listener of this.listeners) {
      listener()
    }
  }

  update(partial: Partial<TabSessionState>): void {
    this.state = { ...this.state, ...partial }
    this.notify()
  }

  setTuning(tuning: Tuning): void {
    this.update({ tuning })
  }

  setEntryMode(entryMode: EntryMode): void {
    this.update({ entryMode })
  }

  toggleEntryMode(): void {
    this.update({ entryMode: this.state.entryMode === "lead" ? "chord" : "lead" })
  }

  setTwelveToneSpelling(twelveToneSpelling: boolean): void {
    this.update({ twelveToneSpelling })
  }
}
