// Application constants

export * from "./tab"
