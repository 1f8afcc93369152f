import { describe, expect, it, jest } from '@jest/globals'
import { Observable, Subject } from 'rxjs'
import { weakSubscribe, weakSubscribeUntil } from '../src/subscribe.js'
import { activeObservers } from '../src/registry.js'
import { WeakObserverArgumentError } from '../src/errors.js'
import { MockSource } from '../src/test-utils/mock-source.js'
import { collectGarbage } from '../src/test-utils/gc.js'
import { Validate } from '../src/validation.js'

type Inbox = { values: number[]; errors: unknown[]; completed: boolean }

const makeInbox = (): Inbox => ({ values: [], errors: [], completed: false })

const pushValue = (inbox: Inbox, value: number) => {
  inbox.values.push(value)
}

const callLoosely = (fn: (...args: never[]) => unknown, ...args: unknown[]): unknown =>
  Reflect.apply(fn, undefined, args)

describe('weakSubscribe', () => {
  it('should deliver values until the subscription is released', () => {
    const source = MockSource.make<number>()
    const inbox = makeInbox()

    const subscription = weakSubscribe(source, inbox, pushValue)
    source.test.feed(1, 2)
    subscription.release()
    source.test.feed(3)

    expect(inbox.values).toEqual([1, 2])
    expect(subscription.isClosed()).toBe(true)
    expect(source.test.releases()).toBe(1)
  })

  it('should pass errors to an error callback', () => {
    const source = MockSource.make<number>()
    const inbox = makeInbox()
    const failure = new Error('upstream failed')

    weakSubscribe(source, inbox, pushValue, (target, error) => {
      target.errors.push(error)
    })
    source.test.fail(failure)

    expect(inbox.errors).toEqual([failure])
    expect(source.test.releases()).toBe(1)
  })

  it('should pass completion to a completion callback without an error callback', () => {
    const source = MockSource.make<number>()
    const inbox = makeInbox()

    weakSubscribe(source, inbox, pushValue, undefined, (target) => {
      target.completed = true
    })
    source.test.feed(5)
    source.test.complete()

    expect(inbox).toEqual({ values: [5], errors: [], completed: true })
  })

  it('should rethrow errors when given only value and completion callbacks', () => {
    const source = MockSource.make<number>()
    const inbox = makeInbox()
    const failure = new Error('nobody handles this')

    const subscription = weakSubscribe(source, inbox, {
      next: pushValue,
      complete: (target) => {
        target.completed = true
      },
    })

    expect(() => source.test.fail(failure)).toThrow(failure)
    expect(subscription.isClosed()).toBe(true)
    expect(source.test.releases()).toBe(1)
    expect(inbox.completed).toBe(false)
  })

  it('should reject a source without subscribe before creating an observer', () => {
    const before = activeObservers.all().length

    expect(() => callLoosely(weakSubscribe, {}, makeInbox(), pushValue)).toThrow(
      WeakObserverArgumentError,
    )
    expect(activeObservers.all()).toHaveLength(before)
  })

  it('should work with an RxJS subject', () => {
    const subject = new Subject<number>()
    const inbox = makeInbox()

    const subscription = weakSubscribe(subject, inbox, pushValue)
    subject.next(1)
    subject.next(2)
    expect(subject.observed).toBe(true)

    subscription.unsubscribe()
    subject.next(3)

    expect(inbox.values).toEqual([1, 2])
    expect(subject.observed).toBe(false)
  })

  it('should run the teardown of an RxJS source failing during subscribe once', () => {
    const failure = new Error('refused')
    let teardowns = 0
    const failing = new Observable<number>((subscriber) => {
      subscriber.error(failure)
      return () => {
        teardowns += 1
      }
    })
    const inbox = makeInbox()

    const subscription = weakSubscribe(failing, inbox, {
      next: pushValue,
      error: (target, error) => {
        target.errors.push(error)
      },
    })
    subscription.release()

    expect(inbox.errors).toEqual([failure])
    expect(teardowns).toBe(1)
    expect(subscription.isClosed()).toBe(true)
  })

  it('should validate the callbacks once per subscription', () => {
    const validateCallbacks = jest.spyOn(Validate, 'callbacks')
    try {
      weakSubscribe(MockSource.make<number>(), makeInbox(), pushValue, undefined, () => undefined)
      expect(validateCallbacks).toHaveBeenCalledTimes(1)
    } finally {
      validateCallbacks.mockRestore()
    }
  })

  it('should end the subscription once the target was garbage-collected', async () => {
    const subject = new Subject<number>()
    // a jest mock would record, and so retain, the target passed to it
    let calls = 0
    const subscribeThrowaway = () => {
      weakSubscribe(subject, { name: 'throwaway' }, (_target, _value: number) => {
        calls += 1
      })
    }

    subscribeThrowaway()
    subject.next(1)
    await collectGarbage()
    subject.next(2)

    expect(calls).toBe(1)
    expect(subject.observed).toBe(false)
  })
})

describe('weakSubscribeUntil', () => {
  it('should deliver values until the abort signal fires', () => {
    const subject = new Subject<number>()
    const controller = new AbortController()
    const inbox = makeInbox()

    weakSubscribeUntil(subject, inbox, pushValue, controller.signal)
    subject.next(1)
    controller.abort()
    subject.next(2)

    expect(inbox.values).toEqual([1])
    expect(subject.observed).toBe(false)
  })

  it('should not subscribe when the abort signal already fired', () => {
    const subject = new Subject<number>()
    const inbox = makeInbox()

    weakSubscribeUntil(subject, inbox, { next: pushValue }, AbortSignal.abort())
    subject.next(1)

    expect(subject.observed).toBe(false)
    expect(inbox.values).toEqual([])
  })

  it('should end on completion and leave the abort signal without listeners', () => {
    const source = MockSource.make<number>()
    const controller = new AbortController()
    const inbox = makeInbox()

    weakSubscribeUntil(
      source,
      inbox,
      {
        next: pushValue,
        complete: (target) => {
          target.completed = true
        },
      },
      controller.signal,
    )
    source.test.complete()
    controller.abort()

    expect(inbox.completed).toBe(true)
    expect(source.test.releases()).toBe(1)
  })

  it('should take a positional error callback before the signal', () => {
    const source = MockSource.make<number>()
    const controller = new AbortController()
    const inbox = makeInbox()
    const failure = new Error('upstream failed')

    weakSubscribeUntil(
      source,
      inbox,
      pushValue,
      (target, error) => {
        target.errors.push(error)
      },
      controller.signal,
    )
    source.test.feed(1)
    source.test.fail(failure)

    expect(inbox).toEqual({ values: [1], errors: [failure], completed: false })
    expect(source.test.releases()).toBe(1)
  })

  it('should take a positional completion callback after an omitted error callback', () => {
    const source = MockSource.make<number>()
    const controller = new AbortController()
    const inbox = makeInbox()

    weakSubscribeUntil(
      source,
      inbox,
      pushValue,
      undefined,
      (target) => {
        target.completed = true
      },
      controller.signal,
    )
    source.test.feed(2)
    source.test.complete()
    controller.abort()

    expect(inbox).toEqual({ values: [2], errors: [], completed: true })
    expect(source.test.releases()).toBe(1)
  })

  it('should rethrow errors when given positional callbacks without an error callback', () => {
    const source = MockSource.make<number>()
    const inbox = makeInbox()
    const failure = new Error('nobody handles this')

    weakSubscribeUntil(source, inbox, pushValue, undefined, undefined, new AbortController().signal)

    expect(() => source.test.fail(failure)).toThrow(failure)
    expect(source.test.releases()).toBe(1)
  })

  it('should reject something that is not a cancellation signal', () => {
    expect(() =>
      callLoosely(weakSubscribeUntil, MockSource.make(), makeInbox(), pushValue, {}),
    ).toThrow(WeakObserverArgumentError)
  })
})
