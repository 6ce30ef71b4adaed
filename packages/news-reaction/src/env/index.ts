export namespace Env {
  export const KEY = {
    dataDir: "NEWS_REACTION_DATA_DIR",
    logLevel: "NEWS_REACTION_LOG_LEVEL",
    localTimeZone: "NEWS_REACTION_LOCAL_TZ",
    originTimeZone: "NEWS_REACTION_ORIGIN_TZ",
  } as const

  export type Key = (typeof KEY)[keyof typeof KEY]

  export function get(key: Key, env: NodeJS.ProcessEnv = process.env) {
    const value = env[key]?.trim()
    return value ? value : undefined
  }
}
