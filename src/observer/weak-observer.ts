import { makeLog } from '../log.js'
import { activeObservers, ActiveObserverRegistryRegisterSymbol } from '../registry.js'
import { DisposableResource, type Observer, type Teardown } from '../source.js'
import { TargetRef } from '../target-ref.js'
import { DisposalHandle, TerminationHooks } from '../utils/disposal.js'
import { Validate } from '../validation.js'
import {
  type OnCompleted,
  type OnError,
  type OnNext,
  WeakObserverCallbacks,
} from './callbacks.js'
import { makeEmitter, type TerminationReason, type WeakObserverEmitter } from './emitter.js'

const log = makeLog('observer')

/**
 * Observer that holds its target weakly and ends its own subscription once
 * the target is gone.
 *
 * The observer moves from active to terminated exactly once. Error,
 * completion, `dispose`, cancellation and a value arriving after the target
 * was collected all attempt that same transition; the first one wins and the
 * rest are no-ops. The underlying subscription is released exactly once, and
 * before any exception thrown by a terminal callback reaches the caller.
 *
 * The observer itself satisfies `Observer<T>` so it can be handed to a source
 * directly.
 *
 * @example
 * const observer = WeakObserver.make(view, (v, price: number) => v.showPrice(price))
 * observer.bindSubscription(prices.subscribe(observer))
 */
export type WeakObserver<T> = Observer<T> & {
  id: symbol
  events: WeakObserverEmitter

  /**
   * Calls `next` with the resolved target, or terminates with
   * `target-collected` when the target is gone. An exception thrown by `next`
   * propagates to the caller and leaves the observer active.
   */
  deliverValue: (value: T) => void

  /**
   * Calls `error` with the resolved target, if any, then terminates. The
   * subscription is released even when `error` throws.
   */
  deliverError: (error: unknown) => void

  /**
   * Calls `complete` with the resolved target, if any, then terminates. The
   * subscription is released even when `complete` throws.
   */
  deliverCompleted: () => void

  /**
   * Terminates the observer. Safe to call any number of times, including from
   * within one of its own callbacks.
   */
  dispose: (reason?: WeakObserver.DisposeReason) => void

  /**
   * Attaches the resource returned by the source's `subscribe`. When the
   * observer has already terminated, e.g. because the source failed during
   * `subscribe`, the resource is released immediately.
   */
  bindSubscription: (resource: Teardown) => void

  /**
   * Runs `hook` once on termination, after the subscription was released.
   * Runs it immediately when the observer has already terminated.
   */
  addTerminationHook: (hook: () => unknown) => void

  isTerminated: () => boolean

  /**
   * @returns null while the observer is active
   */
  terminationReason: () => TerminationReason | null
}

export namespace WeakObserver {
  /**
   * The widest type of WeakObserver. Any other WeakObserver extends this type
   */
  export type Any = WeakObserver<never>

  export type DisposeReason = Extract<TerminationReason, 'disposed' | 'cancelled'>

  /**
   * Creates an observer holding `target` through a `WeakRef`.
   * @throws WeakObserverArgumentError on a missing target or callback
   */
  export function make<Target extends object, T>(
    target: Target,
    callbacks: WeakObserverCallbacks<Target, T>,
  ): WeakObserver<T>
  export function make<Target extends object, T>(
    target: Target,
    next: OnNext<Target, T>,
    error?: OnError<Target>,
    complete?: OnCompleted<Target>,
  ): WeakObserver<T>
  export function make<Target extends object, T>(
    target: Target,
    nextOrCallbacks: OnNext<Target, T> | WeakObserverCallbacks<Target, T>,
    error?: OnError<Target>,
    complete?: OnCompleted<Target>,
  ): WeakObserver<T> {
    Validate.target(target)
    return fromRef(
      TargetRef.weak(target),
      WeakObserverCallbacks.from(nextOrCallbacks, error, complete),
    )
  }

  /**
   * Creates an observer over an existing target reference, e.g. one from
   * `TargetRef.manual`.
   */
  export const fromRef = <Target extends object, T>(
    ref: TargetRef<Target>,
    callbacks: WeakObserverCallbacks<Target, T>,
  ): WeakObserver<T> => {
    Validate.targetRef(ref)
    const { next, error, complete } = WeakObserverCallbacks.resolve(callbacks)

    const id = Symbol('WeakObserver')
    const events = makeEmitter()
    const subscription = DisposalHandle.make()
    const hooks = TerminationHooks.make()

    let reason: TerminationReason | null = null
    let finished = false

    // Every trigger goes through here; only the first caller gets `true`.
    const stop = (why: TerminationReason): boolean => {
      if (reason !== null) return false
      reason = why
      return true
    }

    const finish = (): void => {
      if (finished || reason === null) return
      finished = true
      const why = reason
      try {
        subscription.dispose()
      } finally {
        // a throwing teardown still counts as terminated
        hooks.run()
        log.debug('%s terminated: %s', id.toString(), why)
        events.emit('terminated', why)
      }
    }

    const deliverValue: WeakObserver<T>['deliverValue'] = (value) => {
      if (reason !== null) return
      const target = ref.deref()
      if (target === undefined) {
        log.info('target of %s is gone, ending subscription', id.toString())
        stop('target-collected')
        finish()
        return
      }
      next(target, value)
    }

    const deliverError: WeakObserver<T>['deliverError'] = (err) => {
      if (!stop('error')) return
      try {
        const target = ref.deref()
        if (target !== undefined) {
          error(target, err)
        } else {
          log.warn('%s dropped an error, target is gone: %O', id.toString(), err)
        }
      } finally {
        finish()
      }
    }

    const deliverCompleted: WeakObserver<T>['deliverCompleted'] = () => {
      if (!stop('completed')) return
      try {
        const target = ref.deref()
        if (target !== undefined) complete(target)
      } finally {
        finish()
      }
    }

    const dispose: WeakObserver<T>['dispose'] = (why = 'disposed') => {
      stop(why)
      finish()
    }

    const bindSubscription: WeakObserver<T>['bindSubscription'] = (resource) =>
      subscription.assign(DisposableResource.from(resource))

    const observer: WeakObserver<T> = {
      id,
      events,
      deliverValue,
      deliverError,
      deliverCompleted,
      next: deliverValue,
      error: deliverError,
      complete: deliverCompleted,
      dispose,
      bindSubscription,
      addTerminationHook: hooks.add,
      isTerminated: () => reason !== null,
      terminationReason: () => reason,
    }

    activeObservers[ActiveObserverRegistryRegisterSymbol](observer)

    return observer
  }
}
