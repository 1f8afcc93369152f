import { z } from 'zod'
import { fromZodError } from 'zod-validation-error'
import { WeakObserverArgumentError } from './errors.js'

const Target = z.custom<object>(
  (value) => (typeof value === 'object' && value !== null) || typeof value === 'function',
  { message: 'Expected a non-null object or function' },
)

const Callbacks = z.object({
  next: z.function(),
  error: z.function().optional(),
  complete: z.function().optional(),
})

const Source = z.object({ subscribe: z.function() })

const TargetRef = z.object({ deref: z.function() })

const Signal = z.union([
  z.instanceof(AbortSignal),
  z.object({
    canBeTriggered: z.function(),
    isTriggered: z.function(),
    register: z.function(),
  }),
])

const check =
  (schema: z.ZodTypeAny, what: string) =>
  (value: unknown): void => {
    const result = schema.safeParse(value)
    if (!result.success) {
      throw new WeakObserverArgumentError(
        fromZodError(result.error, { prefix: `Invalid ${what}` }).message,
      )
    }
  }

/**
 * Argument checks run before anything is subscribed. Each throws
 * `WeakObserverArgumentError` describing the offending argument. Only the
 * check result is used; values are never replaced by their parsed copies.
 */
export const Validate = {
  target: check(Target, 'target'),
  targetRef: check(TargetRef, 'target reference'),
  callbacks: check(Callbacks, 'callbacks'),
  source: check(Source, 'source'),
  signal: check(Signal, 'cancellation signal'),
}
