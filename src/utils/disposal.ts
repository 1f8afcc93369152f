import { DisposalHandleAlreadyAssignedError } from '../errors.js'
import { makeLog } from '../log.js'
import type { DisposableResource } from '../source.js'

const log = makeLog('disposal')

/**
 * Single-assignment slot for one underlying subscription resource.
 *
 * A subscribe call only hands back its resource after it returns, but the
 * subscription may already have ended during that call. Whatever is assigned
 * after `dispose` is therefore released on the spot instead of being stored.
 */
export type DisposalHandle = {
  /**
   * Stores `resource`, or releases it immediately if the handle is already
   * disposed.
   * @throws DisposalHandleAlreadyAssignedError when a resource is already
   * stored
   */
  assign: (resource: DisposableResource) => void
  /**
   * Releases the stored resource, if any. Only the first call has an effect.
   */
  dispose: () => void
  isDisposed: () => boolean
}

export namespace DisposalHandle {
  type State =
    | { type: 'empty' }
    | { type: 'assigned'; resource: DisposableResource }
    | { type: 'disposed' }

  const DISPOSED: State = { type: 'disposed' }

  export const make = (): DisposalHandle => {
    let state: State = { type: 'empty' }

    const assign: DisposalHandle['assign'] = (resource) => {
      if (state.type === 'disposed') {
        log.debug('resource assigned after disposal, releasing')
        resource.release()
        return
      }
      if (state.type === 'assigned') throw new DisposalHandleAlreadyAssignedError()
      state = { type: 'assigned', resource }
    }

    const dispose: DisposalHandle['dispose'] = () => {
      // swap first so that a release re-entering dispose finds nothing to do
      const previous = state
      state = DISPOSED
      if (previous.type === 'assigned') previous.resource.release()
    }

    return {
      assign,
      dispose,
      isDisposed: () => state.type === 'disposed',
    }
  }
}

/**
 * Functions run once when their owner terminates. A hook added after that
 * point runs immediately.
 */
export type TerminationHooks = ReturnType<typeof TerminationHooks['make']>

export namespace TerminationHooks {
  export const make = () => {
    let ran = false
    const hooks = new Set<() => unknown>()
    return {
      add: (hook: () => unknown): void => {
        if (ran) {
          runGuarded(hook)
          return
        }
        hooks.add(hook)
      },
      run: (): void => {
        if (ran) return
        ran = true
        const pending = Array.from(hooks)
        hooks.clear()
        pending.forEach(runGuarded)
      },
    }
  }

  const runGuarded = (hook: () => unknown) => {
    try {
      hook()
    } catch (error) {
      log.error('error while running a termination hook: %O', error)
    }
  }
}
