export {
  AppConfigProvider,
  AppConfigProviderLive,
  configProviderWithOverrides,
} from "./config-provider"
export {
  type EntryMode,
  TabConfig,
  TabConfigLive,
  type TabConfigValues,
  loadTabConfig,
  loadTabDebug,
  tabConfig,
  tabDebugConfig,
} from "./tab-config"
