/**
 * Non-owning relation to the object that receives notifications. `deref`
 * yields a strong reference that stays valid for the caller's synchronous
 * work, or `undefined` once the target is gone.
 */
export type TargetRef<Target extends object> = {
  deref: () => Target | undefined
}

export namespace TargetRef {
  /**
   * Backed by `WeakRef`: the target is gone once the garbage collector
   * reclaimed it.
   */
  export const weak = <Target extends object>(target: Target): TargetRef<Target> => {
    const ref = new WeakRef(target)
    return { deref: () => ref.deref() }
  }

  export type Manual<Target extends object> = TargetRef<Target> & {
    /**
     * Marks the target as gone. Call this from the owner's destruction path.
     */
    release: () => void
    isAlive: () => boolean
  }

  /**
   * Liveness controlled by the owner instead of the garbage collector. The
   * target is held until `release` is called and never resolves afterwards.
   *
   * @example
   * const ref = TargetRef.manual(widget)
   * widget.onDestroy(ref.release)
   * subscribeObserver(source, WeakObserver.fromRef(ref, { next: (w, v) => w.render(v) }))
   */
  export const manual = <Target extends object>(target: Target): Manual<Target> => {
    let held: Target | undefined = target
    return {
      deref: () => held,
      release: () => {
        held = undefined
      },
      isAlive: () => held !== undefined,
    }
  }
}
