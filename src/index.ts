export * from "./constants"
export * from "./core"
export * from "./lib/chords"
export * from "./lib/tab"
export * from "./services"
