/**
 * Outcome of a single-entity lookup against an upstream API.
 *
 * A missing entity is a normal answer, not a failure, so it gets its own
 * variant instead of being inferred from an error message.
 */
export type LookupResult<T> =
  | { status: 'found'; value: T }
  | { status: 'not_found' }
  | { status: 'error'; error: Error }

export const found = <T>(value: T): LookupResult<T> => ({
  status: 'found',
  value,
})

export const notFound = <T>(): LookupResult<T> => ({ status: 'not_found' })

export const lookupFailed = <T>(error: Error): LookupResult<T> => ({
  status: 'error',
  error,
})

/**
 * Collapses a lookup into the public client contract: the value, `null`
 * when absent, or the transport error thrown.
 */
export function unwrapLookup<T>(result: LookupResult<T>): T | null {
  switch (result.status) {
    case 'found':
      return result.value
    case 'not_found':
      return null
    case 'error':
      throw result.error
  }
}
