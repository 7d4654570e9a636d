/**
 * Tablature grid geometry
 *
 * A string-line is `<prefix:3><margin:2><cells...>`, every cell 3 characters wide.
 */

export const STRING_COUNT = 6
export const CELL_WIDTH = 3
export const PREFIX_WIDTH = 3
export const FIRST_CELL_COLUMN = 5
export const OCTAVE = 12
export const MAX_FRET = 24

export const DEFAULT_STAFF_WIDTH = 77

export const BLANK_CELL = "---"
export const BARLINE_CELL = "--|"
