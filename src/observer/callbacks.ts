import { Validate } from '../validation.js'

export type OnNext<Target, T> = (target: Target, value: T) => unknown
export type OnError<Target> = (target: Target, error: unknown) => unknown
export type OnCompleted<Target> = (target: Target) => unknown

/**
 * Callbacks receive the resolved target as their first argument so that they
 * do not need to close over it. Define them outside the target's own scope,
 * otherwise the closure keeps the target alive.
 */
export type WeakObserverCallbacks<Target, T> = {
  next: OnNext<Target, T>
  /**
   * Defaults to rethrowing the error to whoever delivered it.
   */
  error?: OnError<Target>
  /**
   * Defaults to doing nothing.
   */
  complete?: OnCompleted<Target>
}

export type ResolvedCallbacks<Target, T> = Required<WeakObserverCallbacks<Target, T>>

export namespace WeakObserverCallbacks {
  export const rethrow = (_target: unknown, error: unknown): never => {
    throw error
  }

  // eslint-disable-next-line @typescript-eslint/no-empty-function
  export const NOP = (_target: unknown): void => {}

  /**
   * Turns the positional `next, error?, complete?` form into a callbacks
   * object. A callbacks object is passed through as is.
   */
  export const from = <Target, T>(
    nextOrCallbacks: OnNext<Target, T> | WeakObserverCallbacks<Target, T>,
    error?: OnError<Target>,
    complete?: OnCompleted<Target>,
  ): WeakObserverCallbacks<Target, T> =>
    typeof nextOrCallbacks === 'function'
      ? { next: nextOrCallbacks, error, complete }
      : nextOrCallbacks

  /**
   * Validates `callbacks` and fills the missing slots with their defaults.
   */
  export const resolve = <Target, T>(
    callbacks: WeakObserverCallbacks<Target, T>,
  ): ResolvedCallbacks<Target, T> => {
    Validate.callbacks(callbacks)
    return {
      next: callbacks.next,
      error: callbacks.error ?? rethrow,
      complete: callbacks.complete ?? NOP,
    }
  }
}
