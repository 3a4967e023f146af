import * as _ from 'radash'

export type SafePromise<T, E extends Error = Error> = Promise<Safe<T, E>>

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

/**
 * Runs an async callback and returns an `[error, result]` tuple instead of
 * throwing.
 */
export async function safeTry<T>(promise: () => Promise<T>): SafePromise<T> {
  return _.try(promise)()
}
