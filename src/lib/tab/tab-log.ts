import { loadTabDebug } from "@/services/tab-config"

let debugEnabled: boolean | null = null

function isDebugEnabled(): boolean {
  if (debugEnabled === null) {
    debugEnabled = loadTabDebug()
  }
  return debugEnabled
}

/**
 * Override the TAB_DEBUG setting for the rest of the process.
 * `null` drops the override and re-reads TAB_DEBUG on the next log.
 */
export function setTabDebug(enabled: boolean | null): void {
  debugEnabled = enabled
}

export function tabLog(category: string, message: string, data?: Record<string, unknown>): void {
  if (!isDebugEnabled()) return
  const timestamp = new Date().toISOString().substring(11, 23)
  const dataStr = data ? ` ${JSON.stringify(data)}` : ""
  console.log(`[TAB ${timestamp}] [${category}] ${message}${dataStr}`)
}

export function formatErrorForLog(error: unknown): string {
  if (typeof error === "object" && error !== null && "_tag" in error) {
    return `${String(error._tag)}: ${JSON.stringify(error)}`
  }
  if (error instanceof Error) return `${error.name}: ${error.message}`
  try {
    return JSON.stringify(error)
  } catch {
    return String(error)
  }
}
