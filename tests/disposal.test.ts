import { describe, expect, it, jest } from '@jest/globals'
import { DisposalHandle, TerminationHooks } from '../src/utils/disposal.js'
import { DisposalHandleAlreadyAssignedError } from '../src/errors.js'

describe('DisposalHandle', () => {
  it('should release the assigned resource once no matter how often it is disposed', () => {
    const release = jest.fn()
    const handle = DisposalHandle.make()
    handle.assign({ release })

    expect(handle.isDisposed()).toBe(false)
    handle.dispose()
    handle.dispose()
    handle.dispose()

    expect(release).toHaveBeenCalledTimes(1)
    expect(handle.isDisposed()).toBe(true)
  })

  it('should release a resource assigned after disposal immediately', () => {
    const release = jest.fn()
    const handle = DisposalHandle.make()
    handle.dispose()

    handle.assign({ release })

    expect(release).toHaveBeenCalledTimes(1)
    handle.dispose()
    expect(release).toHaveBeenCalledTimes(1)
  })

  it('should reject a second assignment while live', () => {
    const first = jest.fn()
    const second = jest.fn()
    const handle = DisposalHandle.make()
    handle.assign({ release: first })

    expect(() => handle.assign({ release: second })).toThrow(DisposalHandleAlreadyAssignedError)

    handle.dispose()
    expect(first).toHaveBeenCalledTimes(1)
    expect(second).not.toHaveBeenCalled()
  })

  it('should accept any number of assignments after disposal, releasing each', () => {
    const releases = [jest.fn(), jest.fn()]
    const handle = DisposalHandle.make()
    handle.dispose()

    releases.forEach((release) => handle.assign({ release }))

    releases.forEach((release) => expect(release).toHaveBeenCalledTimes(1))
  })

  it('should not release twice when the release re-enters dispose', () => {
    const handle = DisposalHandle.make()
    let releases = 0
    handle.assign({
      release: () => {
        releases += 1
        handle.dispose()
      },
    })

    handle.dispose()

    expect(releases).toBe(1)
  })

  it('should do nothing when disposed while empty', () => {
    const handle = DisposalHandle.make()
    handle.dispose()
    expect(handle.isDisposed()).toBe(true)
  })
})

describe('TerminationHooks', () => {
  it('should run each hook once', () => {
    const calls = new Array(1 + Math.floor(Math.random() * 20)).fill(0)
    const hooks = TerminationHooks.make()
    calls.forEach((_, index) => {
      hooks.add(() => {
        calls[index] += 1
      })
    })

    hooks.run()
    hooks.run()

    expect(calls.filter((count) => count === 1)).toHaveLength(calls.length)
  })

  it('should run a hook added after the run immediately', () => {
    const hooks = TerminationHooks.make()
    hooks.run()

    const late = jest.fn()
    hooks.add(late)

    expect(late).toHaveBeenCalledTimes(1)
  })

  it('should keep running hooks after one throws', () => {
    const hooks = TerminationHooks.make()
    const after = jest.fn()
    hooks.add(() => {
      throw new Error('hook failed')
    })
    hooks.add(after)

    expect(() => hooks.run()).not.toThrow()
    expect(after).toHaveBeenCalledTimes(1)
  })
})
