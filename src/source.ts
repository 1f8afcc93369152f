/**
 * Receiving side of a push-based source. Sources must not overlap deliveries
 * for one subscription and must call at most one of `error` and `complete`.
 */
export type Observer<T> = {
  next: (value: T) => void
  error: (error: unknown) => void
  complete: () => void
}

/**
 * A resource whose `release` is idempotent and never throws.
 */
export type DisposableResource = {
  release: () => void
}

/**
 * Whatever a source hands back from `subscribe`. RxJS subscriptions match the
 * `unsubscribe` shape.
 */
export type Teardown = DisposableResource | { unsubscribe: () => void } | (() => void)

/**
 * The observable source. Any RxJS `Observable` satisfies this structurally.
 */
export type Subscribable<T> = {
  subscribe(observer: Observer<T>): Teardown
}

export namespace DisposableResource {
  export const NOOP: DisposableResource = {
    // eslint-disable-next-line @typescript-eslint/no-empty-function
    release: () => {},
  }

  /**
   * Normalizes a teardown into a resource that runs the underlying teardown
   * at most once.
   */
  export const from = (teardown: Teardown): DisposableResource => {
    const run =
      typeof teardown === 'function'
        ? teardown
        : 'release' in teardown
        ? () => teardown.release()
        : () => teardown.unsubscribe()

    let released = false
    return {
      release: () => {
        if (released) return
        released = true
        run()
      },
    }
  }
}
