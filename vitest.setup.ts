// Tests run against fixed tab settings, whatever the shell or .env files say
const testEnv: Record<string, string> = {
  TAB_STAFF_WIDTH: "77",
  TAB_TWELVE_TONE_SPELLING: "false",
  TAB_ENTRY_MODE: "lead",
  TAB_DEBUG: "false",
}

for (const [key, value] of Object.entries(testEnv)) {
  process.env[key] = value
}
