export { TabSession, type TabSessionState, initialSessionState } from "./TabSession"

export {
  AnalyzeChord,
  ClearNote,
  type CommandResult,
  CopyRegion,
  CopyRetune,
  DeleteCells,
  Embellish,
  type HostInput,
  InsertColumns,
  KillRegion,
  LabelChord,
  LearnTuning,
  MakeStaff,
  MoveCell,
  MoveStaff,
  MoveString,
  OctaveShift,
  PlaceNote,
  RetuneString,
  type TabCommand,
  ToggleBarline,
  Transpose,
  Yank,
  dispatch,
} from "./TabCommands"
