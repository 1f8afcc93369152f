import type { WeakObserver } from './observer/weak-observer.js'

export const ActiveObserverRegistryRegisterSymbol: unique symbol = Symbol(
  'ActiveObserverRegistryRegisterSymbol',
)

export type ActiveObserverRegistry = {
  all: () => WeakObserver.Any[]
  [ActiveObserverRegistryRegisterSymbol]: (observer: WeakObserver.Any) => void
}

/**
 * Contains every weak observer that has not terminated yet. Use `.all` to
 * look for subscriptions that outlive what they were meant to.
 *
 * Entries are held weakly: an observer whose source was dropped without ever
 * terminating it drops out once it is garbage-collected.
 *
 * @example
 * setInterval(() => {
 *   console.log('live weak observers:', activeObservers.all().length)
 * }, 10_000)
 */
export const activeObservers = ((): ActiveObserverRegistry => {
  const observers = new Map<symbol, WeakRef<WeakObserver.Any>>()
  const collected = new FinalizationRegistry<symbol>((id) => {
    observers.delete(id)
  })

  const all: ActiveObserverRegistry['all'] = () =>
    Array.from(observers.values()).flatMap((entry) => {
      const observer = entry.deref()
      return observer && !observer.isTerminated() ? [observer] : []
    })

  const register: ActiveObserverRegistry[typeof ActiveObserverRegistryRegisterSymbol] = (
    observer,
  ) => {
    if (observer.isTerminated()) return
    const { id } = observer
    observer.events.once('terminated', () => {
      observers.delete(id)
      collected.unregister(observer)
    })
    observers.set(id, new WeakRef(observer))
    collected.register(observer, id, observer)
  }

  return { all, [ActiveObserverRegistryRegisterSymbol]: register }
})()
