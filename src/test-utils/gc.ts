import { setFlagsFromString } from 'node:v8'
import { runInNewContext } from 'node:vm'

const loadGc = (): (() => void) => {
  const native = globalThis.gc
  if (typeof native === 'function') {
    return () => {
      native()
    }
  }
  setFlagsFromString('--expose-gc')
  const exposed: unknown = runInNewContext('gc')
  if (typeof exposed !== 'function') throw new Error('gc could not be exposed')
  return () => {
    exposed()
  }
}

/**
 * Runs a full garbage collection. `WeakRef` targets stay alive until the
 * current job ends, so this first yields to the event loop.
 */
export const collectGarbage = async (rounds = 2): Promise<void> => {
  const gc = loadGc()
  for (let i = 0; i < rounds; i += 1) {
    await new Promise((resolve) => setImmediate(resolve))
    gc()
  }
}
