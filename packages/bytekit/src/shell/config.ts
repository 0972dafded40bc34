import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, Either, LogLevel, Option, pipe } from "effect"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

export const Preference = S.Literal("auto", "native", "fallback")

export type Preference = S.Schema.Type<typeof Preference>

const LogLevelLabel = S.Literal("All", "Trace", "Debug", "Info", "Warning", "Error", "Fatal", "None")

const envSchema = S.Struct({
  BYTEKIT_IMPLEMENTATION: S.optionalWith(Preference, { default: () => "auto" }),
  BYTEKIT_LOG_LEVEL: S.optionalWith(LogLevelLabel, { default: () => "Info" })
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  readonly preference: Preference
  readonly logLevel: LogLevel.LogLevel
}

export type EnvSource = Readonly<Record<string, string | undefined>>

export type EnvTarget = Record<string, string | undefined>

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

const toConfig = (env: Env): Config => ({
  preference: env.BYTEKIT_IMPLEMENTATION,
  logLevel: LogLevel.fromLiteral(env.BYTEKIT_LOG_LEVEL)
})

// Blank values count as unset, matching how dotenv writes `KEY=`.
const withoutBlank = (env: EnvSource): EnvSource =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""))

/**
 * Directories from `start` up to the filesystem root, nearest first.
 *
 * @pure true
 * @complexity O(depth) time / O(depth) space
 */
export const ancestorDirectories = (path: Path.Path, start: string): ReadonlyArray<string> => {
  const out: Array<string> = []
  let current = path.resolve(start)
  for (;;) {
    out.push(current)
    const parent = path.dirname(current)
    if (parent === current) {
      return out
    }
    current = parent
  }
}

const findEnvFile = (
  start: string
): Effect.Effect<Option.Option<string>, ConfigError, FileSystem.FileSystem | Path.Path> =>
  pipe(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem.FileSystem)
      const path = yield* _(Path.Path)
      for (const directory of ancestorDirectories(path, start)) {
        const candidate = path.join(directory, ".env")
        const exists = yield* _(fs.exists(candidate))
        if (exists) {
          return Option.some(candidate)
        }
      }
      return Option.none<string>()
    }),
    Effect.mapError(toConfigError)
  )

// Values already present in the target win over the file.
const populate = (target: EnvTarget, parsed: Readonly<Record<string, string>>): number => {
  let applied = 0
  for (const [key, value] of Object.entries(parsed)) {
    if (target[key] === undefined) {
      target[key] = value
      applied++
    }
  }
  return applied
}

const readEnvFile = (
  target: EnvTarget,
  found: string
): Effect.Effect<void, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const content = yield* _(Effect.mapError(fs.readFileString(found), toConfigError))
    const applied = populate(target, dotenv.parse(content))
    yield* _(Effect.logDebug(`loaded ${applied} variables from ${found}`))
  })

// CHANGE: load the nearest .env file before decoding the environment
// WHY: workspaces run tests and scripts from nested package directories
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: https://github.com/motdotla/dotenv#parse
// FORMAT THEOREM: forall cwd: loaded(.env) = first(ancestors(cwd), exists)
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: variables already present in the target are never overwritten
// COMPLEXITY: O(depth)/O(depth)
const loadEnv = (
  target: EnvTarget,
  start: string
): Effect.Effect<void, ConfigError, FileSystem.FileSystem | Path.Path> =>
  pipe(
    findEnvFile(start),
    Effect.flatMap((envFile) =>
      Option.match(envFile, {
        onNone: () => Effect.logDebug("no .env file found"),
        onSome: (found) => readEnvFile(target, found)
      })
    )
  )

export const decodeConfig = (env: EnvSource): Either.Either<Config, ConfigError> =>
  pipe(
    S.decodeUnknownEither(envSchema)(withoutBlank(env)),
    Either.map(toConfig),
    Either.mapLeft((error) => toConfigError(error.message))
  )

// CHANGE: decode bytekit configuration from a .env file and an environment
// WHY: keep boundary data validated before it selects an implementation path
// QUOTE(TZ): "The package entry point resolves a default selection at import time from BYTEKIT_IMPLEMENTATION"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall env: decode(env) = config -> config.preference in {auto, native, fallback}
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: unset variables take their defaults; unknown values are rejected
// COMPLEXITY: O(depth)/O(depth)
export const loadConfigFrom = (
  target: EnvTarget,
  start: string
): Effect.Effect<Config, ConfigError, FileSystem.FileSystem | Path.Path> =>
  pipe(
    loadEnv(target, start),
    Effect.flatMap(() => decodeConfig(target))
  )

export const loadConfig: Effect.Effect<Config, ConfigError, FileSystem.FileSystem | Path.Path> = Effect.suspend(() =>
  loadConfigFrom(process.env, process.cwd())
)
