import { subscribeObserverUntil, subscribeOrDispose } from './cancellation/bridge.js'
import { CancellationSignal } from './cancellation/signal.js'
import {
  type OnCompleted,
  type OnError,
  type OnNext,
  WeakObserverCallbacks,
} from './observer/callbacks.js'
import { WeakObserver } from './observer/weak-observer.js'
import type { DisposableResource, Subscribable } from './source.js'
import { Validate } from './validation.js'

/**
 * Handle of a weak subscription. Releasing it disposes the observer, so the
 * source's own subscription is released exactly once no matter how many
 * times, or by whom, the subscription is ended.
 */
export type WeakSubscription = DisposableResource & {
  /**
   * Alias of `release`, for code written against RxJS subscriptions.
   */
  unsubscribe: () => void
  isClosed: () => boolean
}

export namespace WeakSubscription {
  export const of = (observer: WeakObserver.Any): WeakSubscription => {
    const release = () => observer.dispose()
    return {
      release,
      unsubscribe: release,
      isClosed: observer.isTerminated,
    }
  }
}

/**
 * Subscribes an already built observer to `source`.
 */
export const subscribeObserver = <T>(
  source: Subscribable<T>,
  observer: WeakObserver<T>,
): WeakSubscription => {
  Validate.source(source)
  observer.bindSubscription(subscribeOrDispose(source, observer, observer))
  return WeakSubscription.of(observer)
}

/**
 * Subscribes to `source` on behalf of `target` without keeping `target`
 * alive. Once `target` has been garbage-collected, the next value ends the
 * subscription.
 *
 * @example
 * class PriceView {
 *   constructor(prices: Observable<number>) {
 *     weakSubscribe(prices, this, PriceView.onPrice)
 *   }
 *   static onPrice(self: PriceView, price: number) {
 *     self.render(price)
 *   }
 * }
 */
export function weakSubscribe<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  callbacks: WeakObserverCallbacks<Target, T>,
): WeakSubscription
export function weakSubscribe<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  next: OnNext<Target, T>,
  error?: OnError<Target>,
  complete?: OnCompleted<Target>,
): WeakSubscription
export function weakSubscribe<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  nextOrCallbacks: OnNext<Target, T> | WeakObserverCallbacks<Target, T>,
  error?: OnError<Target>,
  complete?: OnCompleted<Target>,
): WeakSubscription {
  Validate.source(source)
  const observer = WeakObserver.make(
    target,
    WeakObserverCallbacks.from(nextOrCallbacks, error, complete),
  )
  return subscribeObserver(source, observer)
}

type UntilSignal = CancellationSignal | AbortSignal

/**
 * Everything after the value callback: the optional error and completion
 * callbacks, then the signal, which always comes last.
 */
type UntilTail<Target> =
  | [signal: UntilSignal]
  | [error: OnError<Target> | undefined, signal: UntilSignal]
  | [error: OnError<Target> | undefined, complete: OnCompleted<Target> | undefined, signal: UntilSignal]

/**
 * Like `weakSubscribe`, but the subscription lives until `signal` fires, the
 * source terminates or the target is gone. There is no handle to release.
 * Nothing is subscribed when `signal` has already fired.
 *
 * @example
 * weakSubscribeUntil(prices, view, PriceView.onPrice, PriceView.onFailure, controller.signal)
 */
export function weakSubscribeUntil<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  callbacks: WeakObserverCallbacks<Target, T>,
  signal: UntilSignal,
): void
export function weakSubscribeUntil<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  next: OnNext<Target, T>,
  signal: UntilSignal,
): void
export function weakSubscribeUntil<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  next: OnNext<Target, T>,
  error: OnError<Target> | undefined,
  signal: UntilSignal,
): void
export function weakSubscribeUntil<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  next: OnNext<Target, T>,
  error: OnError<Target> | undefined,
  complete: OnCompleted<Target> | undefined,
  signal: UntilSignal,
): void
export function weakSubscribeUntil<Target extends object, T>(
  source: Subscribable<T>,
  target: Target,
  nextOrCallbacks: OnNext<Target, T> | WeakObserverCallbacks<Target, T>,
  ...tail: UntilTail<Target>
): void {
  const [error, complete, signal]: [
    OnError<Target> | undefined,
    OnCompleted<Target> | undefined,
    UntilSignal,
  ] =
    tail.length === 1
      ? [undefined, undefined, tail[0]]
      : tail.length === 2
        ? [tail[0], undefined, tail[1]]
        : tail
  Validate.source(source)
  Validate.signal(signal)
  const observer = WeakObserver.make(
    target,
    WeakObserverCallbacks.from(nextOrCallbacks, error, complete),
  )
  subscribeObserverUntil(source, observer, CancellationSignal.from(signal))
}
