import { ErrorCode, safeTry, SigningError } from '@chainforge/utils'
import debug from 'debug'
import { raceSignal } from 'race-signal'
import type { SignatureValues } from '../types'
import { assertSignatureValues } from './recover'
import type { Signer } from './types'

const log = debug('chainforge:tx:signer')

/**
 * Asks `signer` for a signature over `hash`. The call is raced against
 * `signal` and is never retried. Errors come back as SigningError: one the
 * signer raised itself is rethrown untouched, an abort gets SIGNER_ABORTED
 * and anything else is wrapped with its message kept.
 */
export async function requestSignature(
  signer: Signer,
  hash: Uint8Array,
  signal?: AbortSignal,
): Promise<SignatureValues> {
  const [error, sig] = await safeTry(() =>
    raceSignal(signer.sign(hash, { signal }), signal),
  )
  if (error !== undefined || sig === undefined) {
    // A bare `reject()` arrives here with neither an error nor a result
    throw toSigningError(error, signal)
  }
  if (typeof sig !== 'object' || sig === null) {
    throw new SigningError('Invalid signature: signer returned no signature', {
      code: ErrorCode.InvalidSignature,
    })
  }
  assertSignatureValues(sig)
  return sig
}

function toSigningError(reason: unknown, signal?: AbortSignal): SigningError {
  if (reason instanceof SigningError) {
    log('signer failed: %s', reason.code)
    return reason
  }
  if (signal?.aborted === true) {
    log('signer aborted')
    return new SigningError('Signing aborted', {
      code: ErrorCode.SignerAborted,
      cause: reason,
    })
  }
  log('signer failed: %s', ErrorCode.SignerFailed)
  if (reason instanceof Error) {
    return new SigningError(reason.message, { cause: reason })
  }
  const message = typeof reason === 'string' ? reason : 'Signer rejected'
  return new SigningError(message, { cause: reason })
}
