import { ConfigProvider, Layer } from "effect"

export const AppConfigProvider = ConfigProvider.fromEnv()

export const AppConfigProviderLive = Layer.setConfigProvider(AppConfigProvider)

function envEntries(): [string, string][] {
  return Object.entries(process.env).filter(
    (entry): entry is [string, string] => entry[1] !== undefined,
  )
}

/**
 * The environment with explicit values laid over it. A key given here is
 * never read from the environment, even when its value fails to parse.
 */
export const configProviderWithOverrides = (
  overrides: Readonly<Record<string, string>>,
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map([...envEntries(), ...Object.entries(overrides)]))
