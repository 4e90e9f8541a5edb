import { z } from 'zod'

/** Log levels in increasing severity; `silent` suppresses everything. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Runtime settings shared by every wirekit package. */
export interface Settings {
  readonly logLevel: LogLevel
  /** Upper bound on rounds of any fixpoint rewrite loop. */
  readonly maxRounds: number
}

/** Defaults used when the environment says nothing. */
export const DEFAULT_SETTINGS: Settings = {
  logLevel: 'warn',
  maxRounds: 1000,
}

const envSchema = z.object({
  WIREKIT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  WIREKIT_MAX_ROUNDS: z.coerce.number().int().positive().optional(),
})

type Env = Readonly<Record<string, string | undefined>>

/**
 * Resolve settings from an environment map (env override > default).
 * Throws with the offending variable names when a value does not parse.
 */
export function loadSettings(env: Env = process.env): Settings {
  const result = envSchema.safeParse({
    WIREKIT_LOG_LEVEL: env.WIREKIT_LOG_LEVEL || undefined,
    WIREKIT_MAX_ROUNDS: env.WIREKIT_MAX_ROUNDS || undefined,
  })
  if (!result.success) {
    const keys = Object.keys(result.error.flatten().fieldErrors)
    throw new Error(
      `Invalid environment variable(s): ${keys.join(', ')}. ` +
      `WIREKIT_LOG_LEVEL takes one of ${LOG_LEVELS.join('|')}; ` +
      `WIREKIT_MAX_ROUNDS takes a positive integer.`,
    )
  }
  return {
    logLevel: result.data.WIREKIT_LOG_LEVEL ?? DEFAULT_SETTINGS.logLevel,
    maxRounds: result.data.WIREKIT_MAX_ROUNDS ?? DEFAULT_SETTINGS.maxRounds,
  }
}

/** Settings resolved from `process.env` at load time. */
export const settings: Settings = loadSettings()
