import { Effect, Layer } from "effect"

import type { ConfigError } from "../shell/config.js"
import { DigestLive } from "../shell/digest.js"
import { Entropy } from "../shell/entropy.js"
import { KdfLive } from "../shell/kdf.js"
import type { DispatchCandidates, DispatchSelection } from "./dispatch.js"
import { defaultCandidates, Dispatch, DispatchLive, makeDispatchLayer } from "./dispatch.js"

// Entropy follows the identifier family's selected path.
export const EntropyFromDispatch = Layer.effect(
  Entropy,
  Effect.map(Dispatch, (selection) => selection.identifier.entropy)
)

const withServices = (dispatch: Layer.Layer<Dispatch, ConfigError>) =>
  Layer.mergeAll(
    Layer.provideMerge(EntropyFromDispatch, dispatch),
    DigestLive,
    KdfLive
  )

// CHANGE: assemble every service the effectful operations need
// WHY: one layer wires configuration, selection and the node:crypto collaborators
// QUOTE(TZ): n/a
// REF: user-2026-10-12-bytekit
// SOURCE: n/a
// FORMAT THEOREM: forall op: provide(op, BytekitLive) has no remaining requirements
// PURITY: SHELL
// EFFECT: Layer<Dispatch | Entropy | Digest | Kdf, ConfigError, never>
// INVARIANT: BytekitLive carries the process-wide selection; makeBytekitLayer resolves once per layer value
// COMPLEXITY: O(1)/O(1)
export const makeBytekitLayer = (candidates: DispatchCandidates = defaultCandidates) =>
  withServices(makeDispatchLayer(candidates))

export const BytekitLive = withServices(DispatchLive)

export const layerFromSelection = (selection: DispatchSelection) =>
  Layer.mergeAll(
    Layer.succeed(Dispatch, selection),
    Layer.succeed(Entropy, selection.identifier.entropy),
    DigestLive,
    KdfLive
  )
