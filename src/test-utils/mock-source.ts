import type { Observer, Subscribable } from '../source.js'

/**
 * Detached source used for unit tests. Notifications are fed manually and
 * delivered synchronously, so exceptions thrown by observers reach the test.
 */
export type MockSource<T> = Subscribable<T> & {
  /**
   * Contains test utilities for MockSource
   * @see MockSourceTestUtils for more information
   */
  test: MockSourceTestUtils<T>
}

type MockSourceTestUtils<T> = {
  /**
   * Delivers `value` to every subscription that is still open.
   */
  feed: (...values: T[]) => void
  fail: (error: unknown) => void
  complete: () => void
  /**
   * Number of `subscribe` calls so far.
   */
  subscriptions: () => number
  /**
   * Number of times any returned teardown was called, duplicates included.
   */
  releases: () => number
  /**
   * Subscriptions neither released nor terminated by the source.
   */
  open: () => number
}

export type MockSourceOptions<T> = {
  /**
   * Runs inside `subscribe` before the teardown is returned, e.g. to fail or
   * complete synchronously.
   */
  onSubscribe?: (observer: Observer<T>) => void
}

export namespace MockSource {
  type Entry<T> = { observer: Observer<T>; open: boolean }

  export const make = <T>(options: MockSourceOptions<T> = {}): MockSource<T> => {
    const entries = new Set<Entry<T>>()
    let subscriptions = 0
    let releases = 0

    const openEntries = () => Array.from(entries).filter((entry) => entry.open)

    const terminate = (deliver: (observer: Observer<T>) => void) => {
      openEntries().forEach((entry) => {
        entry.open = false
        deliver(entry.observer)
      })
    }

    const subscribe: Subscribable<T>['subscribe'] = (observer) => {
      subscriptions += 1
      const entry: Entry<T> = { observer, open: true }
      entries.add(entry)
      options.onSubscribe?.({
        next: (value) => {
          if (entry.open) observer.next(value)
        },
        error: (error) => {
          if (!entry.open) return
          entry.open = false
          observer.error(error)
        },
        complete: () => {
          if (!entry.open) return
          entry.open = false
          observer.complete()
        },
      })
      return {
        unsubscribe: () => {
          releases += 1
          entry.open = false
          entries.delete(entry)
        },
      }
    }

    return {
      subscribe,
      test: {
        feed: (...values) =>
          values.forEach((value) =>
            openEntries().forEach((entry) => {
              if (entry.open) entry.observer.next(value)
            }),
          ),
        fail: (error) => terminate((observer) => observer.error(error)),
        complete: () => terminate((observer) => observer.complete()),
        subscriptions: () => subscriptions,
        releases: () => releases,
        open: () => openEntries().length,
      },
    }
  }
}
