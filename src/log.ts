import { debug } from 'debug'

const mkLog = debug('weak-observer')

export type Log = ReturnType<typeof makeLog>

/**
 * Leveled loggers for one component. Output is enabled through the `DEBUG`
 * environment variable, e.g. `DEBUG=weak-observer:*`.
 */
export const makeLog = (component: string) => {
  const base = mkLog.extend(component)
  return {
    debug: base.extend('+'),
    info: base.extend('++'),
    warn: base.extend('+++'),
    error: base.extend('++++'),
  }
}
