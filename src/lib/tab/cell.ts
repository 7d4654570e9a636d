import { BARLINE_CELL, BLANK_CELL, CELL_WIDTH, MAX_FRET } from "@/constants/tab"

/**
 * Note embellishments, stored as the single character in front of the fret digits
 */
export type EmbKind =
  | "Normal"
  | "Hammer"
  | "Pull"
  | "Bend"
  | "Release"
  | "SlideUp"
  | "SlideDown"
  | "Vibrato"
  | "Ghost"
  | "Muffled"

export const EMBELLISHMENT_MARKS: Readonly<Record<EmbKind, string>> = {
  Normal: "-",
  Hammer: "h",
  Pull: "p",
  Bend: "b",
  Release: "r",
  SlideUp: "/",
  SlideDown: "\\",
  Vibrato: "~",
  Ghost: "(",
  Muffled: "X",
}

const MARK_TO_KIND = new Map<string, EmbKind>(
  Object.entries(EMBELLISHMENT_MARKS).flatMap(([kind, mark]) =>
    isEmbKind(kind) ? [[mark, kind] as const] : [],
  ),
)

export function isEmbKind(value: string): value is EmbKind {
  return value in EMBELLISHMENT_MARKS
}

/**
 * One 3-character slot on a string-line.
 * Unknown keeps text we do not understand so it round-trips untouched.
 */
export type Cell =
  | { readonly _tag: "Blank" }
  | { readonly _tag: "Barline" }
  | { readonly _tag: "Note"; readonly embellishment: EmbKind; readonly fret: number }
  | { readonly _tag: "Unknown"; readonly text: string }

export const BLANK: Cell = { _tag: "Blank" }
export const BARLINE: Cell = { _tag: "Barline" }

export function note(fret: number, embellishment: EmbKind = "Normal"): Cell {
  return { _tag: "Note", embellishment, fret }
}

const FRET_DIGITS_REGEX = /^(?:-(\d)|(\d\d))$/

export function parseCell(text: string): Cell {
  if (text === BLANK_CELL) return BLANK
  if (text === BARLINE_CELL) return BARLINE
  if (text.length !== CELL_WIDTH) return { _tag: "Unknown", text }

  const embellishment = MARK_TO_KIND.get(text.charAt(0))
  const digits = text.slice(1).match(FRET_DIGITS_REGEX)
  if (!embellishment || !digits) return { _tag: "Unknown", text }

  const fret = Number(digits[1] ?? digits[2])
  if (fret > MAX_FRET) return { _tag: "Unknown", text }

  return note(fret, embellishment)
}

export function formatCell(cell: Cell): string {
  switch (cell._tag) {
    case "Blank":
      return BLANK_CELL
    case "Barline":
      return BARLINE_CELL
    case "Note":
      return `${EMBELLISHMENT_MARKS[cell.embellishment]}${String(cell.fret).padStart(2, "-")}`
    case "Unknown":
      return cell.text
  }
}

export function isNote(cell: Cell): cell is Extract<Cell, { _tag: "Note" }> {
  return cell._tag === "Note"
}
