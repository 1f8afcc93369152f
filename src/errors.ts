export class WeakObserverError extends Error {
  // https://stackoverflow.com/questions/41102060/typescript-extending-error-class
  constructor(message?: string) {
    super(message)
    this.name = 'WeakObserverError'
    Object.setPrototypeOf(this, WeakObserverError.prototype)
  }
}

/**
 * Thrown synchronously when a weak observer or a weak subscription is built
 * from a missing or malformed argument. Nothing has been subscribed when this
 * is thrown.
 */
export class WeakObserverArgumentError extends WeakObserverError {
  constructor(message?: string) {
    super(message)
    this.name = 'WeakObserverArgumentError'
    Object.setPrototypeOf(this, WeakObserverArgumentError.prototype)
  }
}

export class DisposalHandleAlreadyAssignedError extends WeakObserverError {
  constructor(message = 'a resource has already been assigned to this disposal handle') {
    super(message)
    this.name = 'DisposalHandleAlreadyAssignedError'
    Object.setPrototypeOf(this, DisposalHandleAlreadyAssignedError.prototype)
  }
}

/**
 * Raised by `CancellationSource.cancel` after every registered callback has
 * run, when one or more of them threw.
 */
export class CancellationCallbackError extends WeakObserverError {
  readonly errors: unknown[]

  constructor(errors: unknown[]) {
    super(`${errors.length} cancellation callback(s) threw`)
    this.name = 'CancellationCallbackError'
    this.errors = errors
    Object.setPrototypeOf(this, CancellationCallbackError.prototype)
  }
}
