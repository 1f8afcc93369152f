import { makeLog } from '../log.js'
import type { WeakObserver } from '../observer/weak-observer.js'
import type { Observer, Subscribable, Teardown } from '../source.js'
import { DisposalHandle } from '../utils/disposal.js'
import type { CancellationSignal } from './signal.js'

const log = makeLog('bridge')

/**
 * A source that throws from `subscribe` never delivers; the observer is
 * terminated before the exception is passed on.
 */
export const subscribeOrDispose = <T>(
  source: Subscribable<T>,
  receiver: Observer<T>,
  observer: WeakObserver<T>,
): Teardown => {
  try {
    return source.subscribe(receiver)
  } catch (error) {
    observer.dispose()
    throw error
  }
}

/**
 * Subscribes `observer` to `source` for as long as `signal` has not fired.
 *
 * - A signal that can never fire leads to a plain subscription.
 * - A signal that already fired leads to no subscription and no
 *   notifications at all; the observer ends up terminated as `cancelled`.
 * - Otherwise firing the signal disposes the observer. The registration on
 *   the signal is released on every way the observer can terminate; on error
 *   and completion it is released before the terminal callback runs.
 */
export const subscribeObserverUntil = <T>(
  source: Subscribable<T>,
  observer: WeakObserver<T>,
  signal: CancellationSignal,
): void => {
  if (!signal.canBeTriggered()) {
    observer.bindSubscription(subscribeOrDispose(source, observer, observer))
    return
  }

  if (signal.isTriggered()) {
    log.debug('signal already triggered, %s is not subscribed', observer.id.toString())
    // no callback runs; this only takes the observer out of the active registry
    observer.dispose('cancelled')
    return
  }

  const registration = DisposalHandle.make()
  observer.addTerminationHook(registration.dispose)

  const teardown = subscribeOrDispose(
    source,
    {
      next: (value) => observer.deliverValue(value),
      error: (error) => {
        registration.dispose()
        observer.deliverError(error)
      },
      complete: () => {
        registration.dispose()
        observer.deliverCompleted()
      },
    },
    observer,
  )
  observer.bindSubscription(teardown)

  registration.assign(signal.register(() => observer.dispose('cancelled')))

  // fired during subscribe, on a signal that does not call late registrations
  if (signal.isTriggered()) observer.dispose('cancelled')
}
