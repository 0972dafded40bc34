import type * as FileSystem from "@effect/platform/FileSystem"
import type * as Path from "@effect/platform/Path"
import { NodeContext } from "@effect/platform-node"
import { Context, Effect, Either, Layer, Logger, Match, Option, pipe } from "effect"

import type { CodecShape, EntropyShape, IdentifierLayout, ImplementationPath } from "../core/codec.js"
import { describeThrown } from "../core/errors.js"
import { fallbackCodec, fallbackLayout } from "../core/fallback-codec.js"
import type { Family } from "../core/probe.js"
import { probeCodec, probeIdentifier, ProbeFailure } from "../core/probe.js"
import type { Config, ConfigError, Preference } from "../shell/config.js"
import { decodeConfig, loadConfig } from "../shell/config.js"
import { nodeEntropy, webEntropy } from "../shell/entropy.js"
import { nativeCodec, nativeLayout } from "../shell/native-codec.js"
import { formatError } from "./diagnostics.js"

export type IdentifierStrategy = {
  readonly layout: IdentifierLayout
  readonly entropy: EntropyShape
}

// The native builder may throw when its bindings are missing.
export type Candidate<A> = {
  readonly native: () => A
  readonly fallback: A
}

export type DispatchCandidates = {
  readonly codec: Candidate<CodecShape>
  readonly identifier: Candidate<IdentifierStrategy>
}

export type DispatchSelection = {
  readonly preference: Preference
  readonly codec: CodecShape
  readonly identifier: IdentifierStrategy
  readonly paths: Readonly<Record<Family, ImplementationPath>>
  readonly failures: ReadonlyArray<ProbeFailure>
}

export class Dispatch extends Context.Tag("Dispatch")<
  Dispatch,
  DispatchSelection
>() {}

export const defaultCandidates: DispatchCandidates = {
  codec: {
    native: () => nativeCodec,
    fallback: fallbackCodec
  },
  identifier: {
    native: () => ({ layout: nativeLayout, entropy: nodeEntropy }),
    fallback: { layout: fallbackLayout, entropy: webEntropy }
  }
}

type Resolved<A> = {
  readonly chosen: A
  readonly path: ImplementationPath
  readonly failure: Option.Option<ProbeFailure>
}

const buildAndProbe = <A>(
  family: Family,
  candidate: Candidate<A>,
  probe: (implementation: A) => Either.Either<void, ProbeFailure>
): Either.Either<A, ProbeFailure> =>
  pipe(
    Either.try({
      try: candidate.native,
      catch: (error) => new ProbeFailure({ family, message: describeThrown(error) })
    }),
    Either.flatMap((implementation) => Either.map(probe(implementation), () => implementation))
  )

const resolveFamily = <A>(
  family: Family,
  preference: Preference,
  candidate: Candidate<A>,
  probe: (implementation: A) => Either.Either<void, ProbeFailure>
): Resolved<A> =>
  Match.value(preference).pipe(
    Match.when("fallback", (): Resolved<A> => ({
      chosen: candidate.fallback,
      path: "fallback",
      failure: Option.none()
    })),
    Match.orElse(() =>
      Either.match(buildAndProbe(family, candidate, probe), {
        onLeft: (failure): Resolved<A> => ({ chosen: candidate.fallback, path: "fallback", failure: Option.some(failure) }),
        onRight: (chosen): Resolved<A> => ({ chosen, path: "native", failure: Option.none() })
      })
    )
  )

// CHANGE: pick native or fallback once per operation family
// WHY: callers must observe one implementation for the life of the process
// QUOTE(TZ): "process-wide, read-only selection of native-vs-fallback implementation per function, resolved once at startup"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall p: resolveDispatch("fallback").paths = { codec: fallback, identifier: fallback }
// PURITY: SHELL
// EFFECT: none; probes are synchronous and their failures are values
// INVARIANT: the returned selection is frozen
// COMPLEXITY: O(1)/O(1)
export const resolveDispatch = (
  preference: Preference,
  candidates: DispatchCandidates = defaultCandidates
): DispatchSelection => {
  const codec = resolveFamily("codec", preference, candidates.codec, probeCodec)
  const identifier = resolveFamily(
    "identifier",
    preference,
    candidates.identifier,
    (strategy) => probeIdentifier(strategy.layout, strategy.entropy)
  )
  const selection: DispatchSelection = {
    preference,
    codec: codec.chosen,
    identifier: identifier.chosen,
    paths: Object.freeze({ codec: codec.path, identifier: identifier.path }),
    failures: Object.freeze([...Option.toArray(codec.failure), ...Option.toArray(identifier.failure)])
  }
  return Object.freeze(selection)
}

const logFailure = (preference: Preference) => (failure: ProbeFailure): Effect.Effect<void> => {
  const message = `native ${failure.family} path unavailable, using fallback (${formatError(failure)})`
  return preference === "native" ? Effect.logWarning(message) : Effect.logDebug(message)
}

export const logSelection = (selection: DispatchSelection): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    yield* _(Effect.forEach(selection.failures, logFailure(selection.preference), { discard: true }))
    yield* _(
      Effect.logInfo(
        `implementation selected: codec=${selection.paths.codec} identifier=${selection.paths.identifier}`
      )
    )
  })

const logUnder = (config: Config, log: Effect.Effect<void>): Effect.Effect<void> =>
  pipe(log, Logger.withMinimumLogLevel(config.logLevel))

const resolveFromConfig = (
  candidates: DispatchCandidates
): Effect.Effect<DispatchSelection, ConfigError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function*(_) {
    const config = yield* _(loadConfig)
    const selection = resolveDispatch(config.preference, candidates)
    yield* _(logUnder(config, logSelection(selection)))
    return selection
  })

// CHANGE: resolve the selection from configuration inside a layer, once per layer value
// WHY: Effect programs receive the selection as a service; providing the layer again must not re-probe
// QUOTE(TZ): "resolved once at startup"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall l = makeDispatchLayer(c): every build of l yields the same selection
// PURITY: SHELL
// EFFECT: Layer<Dispatch, ConfigError, never>
// INVARIANT: native builders run at most once per layer value; a failed resolution is retried
// COMPLEXITY: O(1)/O(1)
export const makeDispatchLayer = (candidates: DispatchCandidates = defaultCandidates) => {
  const lock = Effect.unsafeMakeSemaphore(1)
  let resolved: Option.Option<DispatchSelection> = Option.none()
  const resolveOnce = lock.withPermits(1)(
    Effect.suspend((): Effect.Effect<DispatchSelection, ConfigError, FileSystem.FileSystem | Path.Path> =>
      Option.match(resolved, {
        onSome: (selection) => Effect.succeed(selection),
        onNone: () =>
          Effect.tap(resolveFromConfig(candidates), (selection) =>
            Effect.sync(() => {
              resolved = Option.some(selection)
            }))
      })
    )
  )
  return pipe(Layer.effect(Dispatch, resolveOnce), Layer.provide(NodeContext.layer))
}

const processConfig = decodeConfig(process.env)

/**
 * The process-wide selection, resolved once when this module loads from
 * `process.env` alone. The plain codec exports and `DispatchLive` share it.
 */
export const processSelection: DispatchSelection = resolveDispatch(
  Either.match(processConfig, {
    onLeft: (): Preference => "auto",
    onRight: (config) => config.preference
  })
)

const logProcessSelection = (config: Config): Effect.Effect<void> =>
  logUnder(
    config,
    Effect.gen(function*(_) {
      if (config.preference !== processSelection.preference) {
        yield* _(
          Effect.logWarning(
            `BYTEKIT_IMPLEMENTATION=${config.preference} ignored, ` +
              `selection was resolved at startup with ${processSelection.preference}`
          )
        )
      }
      yield* _(logSelection(processSelection))
    })
  )

// CHANGE: provide the process-wide selection to Effect programs
// WHY: plain exports and effectful operations must run on the same paths
// QUOTE(TZ): "process-wide, read-only selection of native-vs-fallback implementation per function, resolved once at startup"
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall builds: DispatchLive yields processSelection
// PURITY: SHELL
// EFFECT: Layer<Dispatch, ConfigError, never>
// INVARIANT: an environment that failed to decode at startup fails every build with that ConfigError
// COMPLEXITY: O(1)/O(1)
export const DispatchLive = pipe(
  Layer.effect(
    Dispatch,
    Effect.gen(function*(_) {
      yield* _(processConfig)
      const config = yield* _(loadConfig)
      yield* _(logProcessSelection(config))
      return processSelection
    })
  ),
  Layer.provide(NodeContext.layer)
)
