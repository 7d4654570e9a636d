/**
 * Host-facing command dispatch
 *
 * Every command resolves the point first. Outside tab, the triggering key is
 * inserted literally; inside tab, the command runs against an immutable
 * TabDocument and the session is only updated when the command succeeds.
 */

import { analyzeChord, formatChordMessage } from "@/lib/chords/chord-analyzer"
import { labelChord } from "@/lib/chords/chord-label"
import type { EmbKind } from "@/lib/tab/cell"
import {
  type StaffDirection,
  type TabContext,
  advance,
  contextAt,
  moveStaff,
  moveStrings,
  pointOf,
  resolve,
  staffOf,
} from "@/lib/tab/cursor"
import {
  type OctaveDirection,
  clearNote,
  octaveShift,
  placeNote,
  toggleEmbellishment,
} from "@/lib/tab/notes"
import {
  type DeleteDirection,
  deleteCells,
  insertColumns,
  killRegion,
  makeStaff,
  toggleBarline,
  yank,
} from "@/lib/tab/staff-editor"
import {
  ChordLabelOutOfSequence,
  NotInTabContext,
  type TabError,
  describeTabError,
} from "@/lib/tab/tab-errors"
import { TabDocument } from "@/lib/tab/tab-document"
import { formatErrorForLog, tabLog } from "@/lib/tab/tab-log"
import { copyRetune, transposeUniform } from "@/lib/tab/transpose"
import { learnTuning, retuneString } from "@/lib/tab/tuning"
import { Data, Effect, Either } from "effect"
import type { TabSession, TabSessionState } from "./TabSession"

// --- Commands ---

export class MoveCell extends Data.TaggedClass("MoveCell")<{ readonly delta: number }> {}
export class MoveString extends Data.TaggedClass("MoveString")<{ readonly delta: number }> {}
export class MoveStaff extends Data.TaggedClass("MoveStaff")<{
  readonly direction: StaffDirection
}> {}
export class MakeStaff extends Data.TaggedClass("MakeStaff")<object> {}
export class InsertColumns extends Data.TaggedClass("InsertColumns")<{ readonly count: number }> {}
export class DeleteCells extends Data.TaggedClass("DeleteCells")<{
  readonly count: number
  readonly direction: DeleteDirection
}> {}
export class ToggleBarline extends Data.TaggedClass("ToggleBarline")<{
  readonly advance: boolean
}> {}
export class KillRegion extends Data.TaggedClass("KillRegion")<object> {}
export class CopyRegion extends Data.TaggedClass("CopyRegion")<object> {}
export class Yank extends Data.TaggedClass("Yank")<object> {}
export class PlaceNote extends Data.TaggedClass("PlaceNote")<{ readonly fret: number }> {}
export class ClearNote extends Data.TaggedClass("ClearNote")<object> {}
export class Embellish extends Data.TaggedClass("Embellish")<{ readonly kind: EmbKind }> {}
export class OctaveShift extends Data.TaggedClass("OctaveShift")<{
  readonly direction: OctaveDirection
}> {}
export class Transpose extends Data.TaggedClass("Transpose")<{ readonly semitones: number }> {}
export class LearnTuning extends Data.TaggedClass("LearnTuning")<object> {}
export class RetuneString extends Data.TaggedClass("RetuneString")<{ readonly note: string }> {}
export class CopyRetune extends Data.TaggedClass("CopyRetune")<object> {}
export class AnalyzeChord extends Data.TaggedClass("AnalyzeChord")<object> {}
export class LabelChord extends Data.TaggedClass("LabelChord")<object> {}

export type TabCommand =
  | MoveCell
  | MoveString
  | MoveStaff
  | MakeStaff
  | InsertColumns
  | DeleteCells
  | ToggleBarline
  | KillRegion
  | CopyRegion
  | Yank
  | PlaceNote
  | ClearNote
  | Embellish
  | OctaveShift
  | Transpose
  | LearnTuning
  | RetuneString
  | CopyRetune
  | AnalyzeChord
  | LabelChord

// --- Host interface ---

export interface HostInput {
  readonly text: string
  readonly point: number
  /** Other end of the selection for region commands */
  readonly mark?: number
  /** Key that triggered the command, inserted literally outside tab */
  readonly key?: string
}

export type CommandResult =
  | {
      readonly _tag: "Applied"
      readonly text: string
      readonly point: number
      readonly message?: string
    }
  | { readonly _tag: "InsertLiteral"; readonly text: string; readonly point: number }
  | {
      readonly _tag: "Failed"
      readonly text: string
      readonly point: number
      readonly error: TabError
      readonly message: string
    }

interface Outcome {
  readonly document: TabDocument
  readonly point: number
  readonly session?: Partial<TabSessionState>
  readonly message?: string
}

function stay(doc: TabDocument, ctx: TabContext, message?: string): Outcome {
  return message === undefined
    ? { document: doc, point: pointOf(doc, ctx) }
    : { document: doc, point: pointOf(doc, ctx), message }
}

const regionEnd = (
  doc: TabDocument,
  ctx: TabContext,
  mark: number | undefined,
): Effect.Effect<TabContext, NotInTabContext> => {
  if (mark === undefined) return Effect.succeed(ctx)
  const end = resolve(doc, mark)
  return end ? Effect.succeed(end) : Effect.fail(new NotInTabContext({ point: mark }))
}

const execute = (
  state: TabSessionState,
  doc: TabDocument,
  ctx: TabContext,
  input: HostInput,
  command: Exclude<TabCommand, MakeStaff>,
): Effect.Effect<Outcome, TabError> =>
  Effect.gen(function* () {
    switch (command._tag) {
      case "MoveCell":
        return stay(doc, advance(doc, ctx, command.delta))

      case "MoveString":
        return stay(doc, moveStrings(doc, ctx, command.delta))

      case "MoveStaff": {
        const target = moveStaff(doc, ctx, command.direction)
        return target ? stay(doc, target) : stay(doc, ctx, `No ${command.direction} staff`)
      }

      case "InsertColumns":
        return insertColumns(doc, ctx, command.count)

      case "DeleteCells":
        return deleteCells(doc, ctx, command.count, command.direction)

      case "ToggleBarline":
        return toggleBarline(doc, ctx, command.advance)

      case "KillRegion":
      case "CopyRegion": {
        const end = yield* regionEnd(doc, ctx, input.mark)
        const deleteSource = command._tag === "KillRegion"
        const { edit, clipboard } = yield* killRegion(doc, ctx, end, deleteSource)
        return {
          document: edit.document,
          point: deleteSource ? edit.point : pointOf(doc, ctx),
          session: { clipboard },
        }
      }

      case "Yank":
        return yield* yank(doc, ctx, state.clipboard)

      case "PlaceNote": {
        const document = yield* placeNote(
          doc,
          ctx,
          command.fret,
          state.pendingEmbellishment ?? "Normal",
        )
        const next = state.entryMode === "lead" ? advance(document, ctx, 1) : ctx
        return {
          document,
          point: pointOf(document, next),
          session: { pendingEmbellishment: null },
        }
      }

      case "ClearNote":
        return stay(clearNote(doc, ctx), ctx)

      case "Embellish": {
        const toggled = toggleEmbellishment(doc, ctx, command.kind)
        if (toggled) return stay(toggled, ctx)
        const pending = state.pendingEmbellishment === command.kind ? null : command.kind
        return {
          ...stay(doc, ctx, pending ? `Next note: ${pending}` : "Embellishment cleared"),
          session: { pendingEmbellishment: pending },
        }
      }

      case "OctaveShift":
        return stay(octaveShift(doc, ctx, command.direction), ctx)

      case "Transpose": {
        const end = yield* regionEnd(doc, ctx, input.mark)
        const document = yield* transposeUniform(doc, ctx, end, command.semitones)
        return stay(document, ctx)
      }

      case "LearnTuning": {
        const tuning = learnTuning(doc, staffOf(doc, ctx))
        return {
          ...stay(doc, ctx, `Tuning: ${tuning.labels.map(l => l.charAt(0)).join("")}`),
          session: { tuning },
        }
      }

      case "RetuneString": {
        const { document, tuning } = yield* retuneString(doc, ctx, command.note)
        return { ...stay(document, ctx), session: { tuning } }
      }

      case "CopyRetune":
        return copyRetune(doc, ctx, state.tuning)

      case "AnalyzeChord": {
        const previous = state.lastCommand === "AnalyzeChord" ? state.pendingChord : null
        const analysis = yield* analyzeChord(doc, ctx, state.tuning, previous, {
          twelveToneSpelling: state.twelveToneSpelling,
        })
        return {
          ...stay(doc, ctx, formatChordMessage(analysis)),
          session: { pendingChord: analysis },
        }
      }

      case "LabelChord": {
        const analysis = state.pendingChord
        if (state.lastCommand !== "AnalyzeChord" || analysis === null) {
          return yield* Effect.fail(new ChordLabelOutOfSequence())
        }
        const document = labelChord(doc, analysis)
        const staff = document.staff(ctx.staffIndex) ?? staffOf(doc, ctx)
        return {
          document,
          point: pointOf(document, contextAt(staff, ctx.stringIndex, ctx.cellIndex)),
          session: { pendingChord: null },
        }
      }
    }
  })

function insertLiteral(input: HostInput): CommandResult {
  const key = input.key ?? ""
  const point = Math.max(0, Math.min(input.point, input.text.length))
  return {
    _tag: "InsertLiteral",
    text: input.text.slice(0, point) + key + input.text.slice(point),
    point: point + key.length,
  }
}

/**
 * Run one command against the host's text and point
 */
export function dispatch(
  session: TabSession,
  input: HostInput,
  command: TabCommand,
): CommandResult {
  const state = session.getSnapshot()
  const doc = TabDocument.fromText(input.text)

  if (command._tag === "MakeStaff") {
    const edit = makeStaff(doc, input.point, state.staffWidth, state.tuning)
    session.update({ lastCommand: command._tag })
    tabLog("command", "MakeStaff applied", { point: edit.point })
    return { _tag: "Applied", text: edit.document.toText(), point: edit.point }
  }

  const ctx = resolve(doc, input.point)
  if (!ctx) {
    session.update({ lastCommand: command._tag })
    tabLog("command", `${command._tag} outside tab, inserting literally`, { point: input.point })
    return insertLiteral(input)
  }

  const result = Effect.runSync(Effect.either(execute(state, doc, ctx, input, command)))

  if (Either.isLeft(result)) {
    const error = result.left
    session.update({ lastCommand: command._tag, pendingChord: null })
    tabLog("command", `${command._tag} failed`, { error: formatErrorForLog(error) })
    return {
      _tag: "Failed",
      text: input.text,
      point: input.point,
      error,
      message: describeTabError(error),
    }
  }

  const outcome = result.right
  session.update({ ...outcome.session, lastCommand: command._tag })
  tabLog("command", `${command._tag} applied`, { point: outcome.point })

  const text = outcome.document.toText()
  const applied = { _tag: "Applied", text, point: outcome.point } as const
  return outcome.message === undefined ? applied : { ...applied, message: outcome.message }
}
