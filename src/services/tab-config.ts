import { CELL_WIDTH, DEFAULT_STAFF_WIDTH, FIRST_CELL_COLUMN } from "@/constants/tab"
import { Config, Context, Effect, Layer } from "effect"
import { AppConfigProviderLive, configProviderWithOverrides } from "./config-provider"

export type EntryMode = "lead" | "chord"

export interface TabConfigValues {
  /** Character width of new string-lines, prefix included */
  readonly staffWidth: number
  readonly twelveToneSpelling: boolean
  /** "lead" advances one cell after each note, "chord" stays put */
  readonly entryMode: EntryMode
  readonly debug: boolean
}

export class TabConfig extends Context.Tag("TabConfig")<TabConfig, TabConfigValues>() {}

export const tabDebugConfig = Config.boolean("TAB_DEBUG").pipe(Config.withDefault(false))

export const tabConfig = Config.all({
  staffWidth: Config.integer("TAB_STAFF_WIDTH").pipe(
    Config.validate({
      message: `Staff width must be at least ${FIRST_CELL_COLUMN + CELL_WIDTH}`,
      validation: (width: number) => width >= FIRST_CELL_COLUMN + CELL_WIDTH,
    }),
    Config.withDefault(DEFAULT_STAFF_WIDTH),
  ),
  twelveToneSpelling: Config.boolean("TAB_TWELVE_TONE_SPELLING").pipe(Config.withDefault(false)),
  entryMode: Config.literal("lead", "chord")("TAB_ENTRY_MODE").pipe(
    Config.withDefault<EntryMode>("lead"),
  ),
  debug: tabDebugConfig,
})

export const TabConfigLive = Layer.effect(TabConfig, tabConfig)

export const loadTabConfig = (overrides?: Readonly<Record<string, string>>): TabConfigValues =>
  Effect.runSync(
    tabConfig.pipe(
      Effect.provide(
        overrides
          ? Layer.setConfigProvider(configProviderWithOverrides(overrides))
          : AppConfigProviderLive,
      ),
    ),
  )

/**
 * TAB_DEBUG alone, for the logger. A malformed value leaves logging off
 * rather than failing whatever was about to log.
 */
export const loadTabDebug = (): boolean =>
  Effect.runSync(
    tabDebugConfig.pipe(
      Effect.orElseSucceed(() => false),
      Effect.provide(AppConfigProviderLive),
    ),
  )
