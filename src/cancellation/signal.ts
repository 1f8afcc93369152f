import { DisposableResource } from '../source.js'

/**
 * External one-shot cancellation signal.
 */
export type CancellationSignal = {
  /**
   * False for signals that can never fire; those need no bridging at all.
   */
  canBeTriggered: () => boolean
  isTriggered: () => boolean
  /**
   * Registers `callback` to run when the signal fires. Releasing the returned
   * handle unregisters it and is idempotent.
   */
  register: (callback: () => void) => DisposableResource
}

export namespace CancellationSignal {
  export const NONE: CancellationSignal = {
    canBeTriggered: () => false,
    isTriggered: () => false,
    register: () => DisposableResource.NOOP,
  }

  /**
   * Adapts an `AbortSignal`. Registering on an already aborted signal runs the
   * callback right away, since the `abort` event will not fire again.
   */
  export const fromAbortSignal = (signal: AbortSignal): CancellationSignal => ({
    canBeTriggered: () => true,
    isTriggered: () => signal.aborted,
    register: (callback) => {
      if (signal.aborted) {
        callback()
        return DisposableResource.NOOP
      }
      const listener = () => callback()
      signal.addEventListener('abort', listener, { once: true })
      return DisposableResource.from(() => signal.removeEventListener('abort', listener))
    },
  })

  export const from = (signal: CancellationSignal | AbortSignal): CancellationSignal =>
    signal instanceof AbortSignal ? fromAbortSignal(signal) : signal
}
