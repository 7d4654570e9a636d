// Pattern table
export {
  type ChordPattern,
  type ChordPatternTable,
  CHORD_PATTERNS,
  ChordPatternSchema,
  buildPatternTable,
  matchPattern,
} from "./chord-patterns"

// Analysis
export {
  type AnalyzeOptions,
  type ChordAnalysis,
  type ChordFrets,
  analyzeChord,
  analyzeFrets,
  chordFretsAt,
  degreeLabel,
  findRootString,
  formatChordMessage,
  intervalSet,
} from "./chord-analyzer"

// Labels
export { labelChord } from "./chord-label"
