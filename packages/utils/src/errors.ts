/**
 * Error taxonomy shared by every package.
 *
 * Each failure surfaces as its own class with a stable `code`, so callers can
 * branch on the kind of failure without parsing messages.
 */

export const ErrorCode = {
  TypeParse: 'TYPE_PARSE',
  AbiJson: 'ABI_JSON',
  Encode: 'ENCODE',
  Decode: 'DECODE',
  SignerFailed: 'SIGNER_FAILED',
  SignerAborted: 'SIGNER_ABORTED',
  InvalidSignature: 'INVALID_SIGNATURE',
  UnsupportedTxType: 'UNSUPPORTED_TX_TYPE',
  InvalidTransaction: 'INVALID_TRANSACTION',
  InvalidConfig: 'INVALID_CONFIG',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

export type ErrorMetadata = Record<string, unknown>

export interface ChainforgeErrorOptions {
  code: ErrorCode
  metadata?: ErrorMetadata
  cause?: unknown
}

/**
 * Base error class for all package errors
 */
export class ChainforgeError extends Error {
  public readonly code: ErrorCode
  public readonly metadata?: ErrorMetadata

  constructor(message: string, options: ChainforgeErrorOptions) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.metadata = options.metadata

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      metadata: this.metadata,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    }
  }
}

type SubclassOptions = Omit<ChainforgeErrorOptions, 'code'>

/**
 * Unknown or malformed ABI type string
 */
export class TypeParseError extends ChainforgeError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: ErrorCode.TypeParse })
  }
}

/**
 * ABI JSON that does not match the schema. `path` names the offending field.
 */
export class AbiJsonError extends ChainforgeError {
  public readonly path: string

  constructor(message: string, path: string, options: SubclassOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.AbiJson,
      metadata: { ...options.metadata, path },
    })
    this.path = path
  }
}

/**
 * Value does not fit the shape of its type
 */
export class EncodeError extends ChainforgeError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: ErrorCode.Encode })
  }
}

/**
 * Truncated or malformed input to an ABI or RLP decoder
 */
export class DecodeError extends ChainforgeError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: ErrorCode.Decode })
  }
}

export type SigningErrorCode =
  | typeof ErrorCode.SignerFailed
  | typeof ErrorCode.SignerAborted
  | typeof ErrorCode.InvalidSignature

/**
 * Failure at the signer boundary
 */
export class SigningError extends ChainforgeError {
  constructor(
    message: string,
    options: SubclassOptions & { code?: SigningErrorCode } = {},
  ) {
    super(message, { ...options, code: options.code ?? ErrorCode.SignerFailed })
  }
}

export class UnsupportedTransactionTypeError extends ChainforgeError {
  public readonly txType: unknown

  constructor(txType: unknown, options: SubclassOptions = {}) {
    super(`Unsupported transaction type: ${String(txType)}`, {
      ...options,
      code: ErrorCode.UnsupportedTxType,
      metadata: { ...options.metadata, txType: String(txType) },
    })
    this.txType = txType
  }
}

/**
 * Transaction fields that conflict, are missing, or are out of range
 */
export class InvalidTransactionError extends ChainforgeError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: ErrorCode.InvalidTransaction })
  }
}

/**
 * Signer configuration that fails validation
 */
export class ConfigError extends ChainforgeError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: ErrorCode.InvalidConfig })
  }
}

export function isChainforgeError(
  err: unknown,
  code?: ErrorCode,
): err is ChainforgeError {
  if (!(err instanceof ChainforgeError)) return false
  return code === undefined || err.code === code
}
