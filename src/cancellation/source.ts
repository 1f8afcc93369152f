import { CancellationCallbackError } from '../errors.js'
import { makeLog } from '../log.js'
import { DisposableResource } from '../source.js'
import type { CancellationSignal } from './signal.js'

const log = makeLog('cancellation')

/**
 * Owner side of a `CancellationSignal`.
 */
export type CancellationSource = {
  signal: CancellationSignal
  /**
   * Fires the signal. Every registered callback runs once, in registration
   * order, even when an earlier one throws. Later calls do nothing.
   * @throws CancellationCallbackError carrying what the callbacks threw
   */
  cancel: () => void
  isCancelled: () => boolean
}

export namespace CancellationSource {
  export const make = (): CancellationSource => {
    let cancelled = false
    const registrations = new Set<{ callback: () => void }>()

    const register: CancellationSignal['register'] = (callback) => {
      if (cancelled) {
        callback()
        return DisposableResource.NOOP
      }
      const registration = { callback }
      registrations.add(registration)
      return DisposableResource.from(() => {
        registrations.delete(registration)
      })
    }

    const cancel = () => {
      if (cancelled) return
      cancelled = true
      log.debug('cancelling %d registration(s)', registrations.size)

      const errors: unknown[] = []
      for (const registration of Array.from(registrations)) {
        // an earlier callback may have released this registration
        if (!registrations.delete(registration)) continue
        try {
          registration.callback()
        } catch (error) {
          errors.push(error)
        }
      }
      if (errors.length > 0) throw new CancellationCallbackError(errors)
    }

    return {
      signal: {
        canBeTriggered: () => true,
        isTriggered: () => cancelled,
        register,
      },
      cancel,
      isCancelled: () => cancelled,
    }
  }
}
