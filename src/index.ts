export type { Observer, Subscribable, Teardown } from './source.js'
export { DisposableResource } from './source.js'
export { TargetRef } from './target-ref.js'
export type { OnNext, OnError, OnCompleted } from './observer/callbacks.js'
export { WeakObserverCallbacks } from './observer/callbacks.js'
export { WeakObserver } from './observer/weak-observer.js'
export type {
  TerminationReason,
  WeakObserverEmitter,
  WeakObserverEventMap,
} from './observer/emitter.js'
export { DisposalHandle } from './utils/disposal.js'
export { CancellationSignal } from './cancellation/signal.js'
export { CancellationSource } from './cancellation/source.js'
export { subscribeObserverUntil } from './cancellation/bridge.js'
export {
  WeakSubscription,
  subscribeObserver,
  weakSubscribe,
  weakSubscribeUntil,
} from './subscribe.js'
export { activeObservers } from './registry.js'
export type { ActiveObserverRegistry } from './registry.js'
export * from './errors.js'
