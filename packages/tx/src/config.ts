import { firstIssue, z, zBigInt } from '@chainforge/schema'
import {
  ConfigError,
  type HashFn,
  keccak256,
  MAX_UINT64,
} from '@chainforge/utils'

export type AuthorizationPreimage = 'packed' | 'rlp'

export interface SignerConfig {
  /** Chain id used when a request does not name one */
  readonly defaultChainId?: bigint
  /**
   * Layout of the EIP-7702 authorization preimage. `packed` is
   * `0x05 ‖ chainId(32) ‖ address(20) ‖ nonce(32)`, `rlp` is
   * `0x05 ‖ rlp([chainId, address, nonce])`.
   */
  readonly authorizationPreimage: AuthorizationPreimage
  readonly hash: HashFn
}

const zSignerConfig = z
  .object({
    defaultChainId: zBigInt({ max: MAX_UINT64 }).optional(),
    authorizationPreimage: z.enum(['packed', 'rlp']).default('packed'),
    hash: z
      .custom<HashFn>((val) => typeof val === 'function', {
        message: 'hash must be a function',
      })
      .optional(),
  })
  .strict()

export type SignerConfigOptions = z.input<typeof zSignerConfig>

export function createSignerConfig(
  options: SignerConfigOptions = {},
): SignerConfig {
  const result = zSignerConfig.safeParse(options)
  if (!result.success) {
    const { path, message } = firstIssue(result.error)
    throw new ConfigError(`Invalid signer config at ${path || '<root>'}: ${message}`, {
      metadata: { path },
    })
  }
  const { defaultChainId, authorizationPreimage, hash } = result.data
  return Object.freeze({
    defaultChainId,
    authorizationPreimage,
    hash: hash ?? keccak256,
  })
}

export const defaultSignerConfig: SignerConfig = createSignerConfig()

const zEnvChainId = z
  .string()
  .regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'must be a decimal or 0x-prefixed hex integer')

/**
 * Reads `CHAINFORGE_CHAIN_ID` and `CHAINFORGE_AUTH_PREIMAGE`. Unset or empty
 * variables fall back to the defaults.
 */
export function signerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): SignerConfig {
  const options: SignerConfigOptions = {}

  const chainId = env.CHAINFORGE_CHAIN_ID?.trim()
  if (chainId !== undefined && chainId !== '') {
    const parsed = zEnvChainId.safeParse(chainId)
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid CHAINFORGE_CHAIN_ID "${chainId}": ${firstIssue(parsed.error).message}`,
        { metadata: { variable: 'CHAINFORGE_CHAIN_ID' } },
      )
    }
    options.defaultChainId = BigInt(parsed.data)
  }

  const preimage = env.CHAINFORGE_AUTH_PREIMAGE?.trim()
  if (preimage !== undefined && preimage !== '') {
    const parsed = z.enum(['packed', 'rlp']).safeParse(preimage)
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid CHAINFORGE_AUTH_PREIMAGE "${preimage}": expected packed or rlp`,
        { metadata: { variable: 'CHAINFORGE_AUTH_PREIMAGE' } },
      )
    }
    options.authorizationPreimage = parsed.data
  }

  return createSignerConfig(options)
}
