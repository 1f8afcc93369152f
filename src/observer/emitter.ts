import { EventEmitter } from 'events'
import type { EventMap } from 'typed-emitter'
import { makeLog } from '../log.js'

const log = makeLog('emitter')

/**
 * Imported this way because it cannot be imported via normal import ... from
 * syntax https://github.com/andywer/typed-emitter/issues/39
 */
export type TypedEventEmitter<Events extends EventMap> = import('typed-emitter').default<Events>

export type TerminationReason = 'completed' | 'error' | 'disposed' | 'cancelled' | 'target-collected'

export type WeakObserverEventMap = {
  /**
   * Emitted once, after the underlying subscription has been released.
   */
  terminated: (reason: TerminationReason) => unknown
}

export type WeakObserverEmitter = TypedEventEmitter<WeakObserverEventMap>

class ThrowIgnoringEmitter extends EventEmitter {
  emit(eventName: string | symbol, ...args: unknown[]) {
    const listeners = this.rawListeners(eventName)

    listeners.forEach((listener) => {
      try {
        listener(...args)
      } catch (error) {
        log.error('listener for %s threw: %O', String(eventName), error)
      }
    })

    return listeners.length > 0
  }
}

export const makeEmitter = (): WeakObserverEmitter => {
  const emitter = new ThrowIgnoringEmitter() as WeakObserverEmitter
  emitter.setMaxListeners(20)
  return emitter
}
