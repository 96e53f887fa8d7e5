import { z } from "zod"
import { EngineConfigError } from "./error"

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Engine-wide settings. Serializer calls may still override `indent` and
 * `arrayAlignLimit` per call.
 */
export interface EngineConfig {
  /**
   * pino level of the root logger.
   * Default: "silent"
   */
  readonly logLevel: LogLevel

  /**
   * Indentation of canonical output (documents without original text).
   * Default: two spaces
   */
  readonly indent: string

  /**
   * Largest `oldLength * newLength` for which array items are aligned by
   * longest common subsequence. Larger arrays align by position.
   * Default: 250000
   */
  readonly arrayAlignLimit: number
}

export const defaultEngineConfig: EngineConfig = {
  logLevel: "silent",
  indent: "  ",
  arrayAlignLimit: 250_000,
}

const lowercased = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim().toLowerCase()))

const LogLevelSchema = lowercased.pipe(z.enum(LOG_LEVELS).default("silent"))

const EnvSchema = z.object({
  JSON_DOC_ENGINE_LOG_LEVEL: LogLevelSchema,

  JSON_DOC_ENGINE_INDENT: lowercased
    .pipe(
      z
        .union([z.literal("tab"), z.string().regex(/^[0-8]$/, "indent must be 0-8 spaces or 'tab'")])
        .default("2")
    )
    .transform((v) => (v === "tab" ? "\t" : " ".repeat(Number(v)))),

  JSON_DOC_ENGINE_ARRAY_ALIGN_LIMIT: lowercased
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int("array align limit must be an integer")
        .min(0, "array align limit cannot be negative")
        .default(defaultEngineConfig.arrayAlignLimit)
    ),
})

/**
 * Reads engine settings from environment variables.
 * Throws an EngineConfigError listing every invalid variable.
 */
export function loadEngineConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): EngineConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new EngineConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    )
  }

  return {
    logLevel: parsed.data.JSON_DOC_ENGINE_LOG_LEVEL,
    indent: parsed.data.JSON_DOC_ENGINE_INDENT,
    arrayAlignLimit: parsed.data.JSON_DOC_ENGINE_ARRAY_ALIGN_LIMIT,
  }
}

let engineConfig: EngineConfig | undefined

/**
 * Settings from the process environment, read once on first use.
 * Serializer defaults and the root logger come from here.
 */
export function getEngineConfig(): EngineConfig {
  if (!engineConfig) {
    engineConfig = loadEngineConfig()
  }
  return engineConfig
}

/**
 * Drops the cached settings so the next `getEngineConfig` reads the environment again.
 */
export function resetEngineConfig(): void {
  engineConfig = undefined
}
