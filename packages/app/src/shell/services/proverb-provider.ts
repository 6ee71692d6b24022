import { Context, Effect, Either, Layer, Option, pipe, Random, SynchronizedRef } from "effect"

import {
  describeProverbDataError,
  parseProverbs,
  proverbAt,
  type ProverbDataError,
  type ProverbSet
} from "../../core/proverbs.js"
import { ProverbResource } from "./proverb-resource.js"

export interface ProverbDraw {
  readonly proverb: string
  readonly loadedNow: boolean
}

export class ProverbProvider extends Context.Tag("ProverbProvider")<
  ProverbProvider,
  {
    readonly loadProverbs: Effect.Effect<ProverbSet, ProverbDataError>
    readonly randomProverb: Effect.Effect<ProverbDraw, ProverbDataError>
    readonly randomProverbText: Effect.Effect<string>
    readonly currentProverbs: Effect.Effect<Option.Option<ProverbSet>>
  }
>() {}

export const LOAD_FAILURE_PREFIX = "Error loading proverbs: "

interface LoadedSet {
  readonly set: ProverbSet
  readonly loadedNow: boolean
}

type StoredSet = Option.Option<ProverbSet>

/**
 * Proverb capability backed by the ProverbResource text.
 *
 * @pure false - reads the resource and draws random numbers
 * @effect ProverbResource, Random
 * @invariant the stored set is replaced only by a successful parse
 * @invariant concurrent first draws trigger a single load
 * @complexity load O(n), draw O(1)
 */
// CHANGE: keep the loaded set in a synchronized cell shared by explicit and lazy loads
// WHY: concurrent first draws must observe a single load
// QUOTE(TZ): "loads the set if none is stored yet (atomically)"
// REF: hello-gopher-proverbs
// SOURCE: n/a
// FORMAT THEOREM: forall d in draws: member(d.proverb, stored.entries)
// PURITY: SHELL
// EFFECT: Effect<ProverbProvider, never, ProverbResource>
// INVARIANT: loadedNow = true iff the draw performed the load
// COMPLEXITY: O(n)/O(n)
export const ProverbProviderLive = Layer.effect(
  ProverbProvider,
  Effect.gen(function*(_) {
    const resource = yield* _(ProverbResource)
    const state = yield* _(SynchronizedRef.make<StoredSet>(Option.none()))

    const parseResource: Effect.Effect<ProverbSet, ProverbDataError> = pipe(
      resource.text,
      Effect.flatMap((text) =>
        Either.match(parseProverbs(text), {
          onLeft: (error) => Effect.fail(error),
          onRight: (set) => Effect.succeed(set)
        })
      ),
      Effect.tap((set) => Effect.logDebug("proverbs loaded").pipe(Effect.annotateLogs("count", set.entries.length))),
      Effect.tapError((error) =>
        Effect.logDebug("proverb load failed").pipe(Effect.annotateLogs("reason", describeProverbDataError(error)))
      )
    )

    const loadProverbs = SynchronizedRef.modifyEffect(
      state,
      (): Effect.Effect<readonly [ProverbSet, StoredSet], ProverbDataError> =>
        Effect.map(parseResource, (set) => [set, Option.some(set)] as const)
    )

    const ensureLoaded = SynchronizedRef.modifyEffect(
      state,
      (current): Effect.Effect<readonly [LoadedSet, StoredSet], ProverbDataError> =>
        Option.match(current, {
          onNone: () => Effect.map(parseResource, (set) => [{ set, loadedNow: true }, Option.some(set)] as const),
          onSome: (set) => Effect.succeed([{ set, loadedNow: false }, current] as const)
        })
    )

    const randomProverb = Effect.gen(function*(_) {
      const { loadedNow, set } = yield* _(ensureLoaded)
      const index = yield* _(Random.nextIntBetween(0, set.entries.length))
      return { proverb: proverbAt(set, index), loadedNow }
    })

    const randomProverbText = pipe(
      randomProverb,
      Effect.map((draw) => draw.proverb),
      Effect.catchAll((error) => Effect.succeed(`${LOAD_FAILURE_PREFIX}${describeProverbDataError(error)}`))
    )

    return {
      loadProverbs,
      randomProverb,
      randomProverbText,
      currentProverbs: SynchronizedRef.get(state)
    }
  })
)
