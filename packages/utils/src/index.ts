/**
 * Address type
 */
export * from './address'
/**
 * Utilities for manipulating bytes, Uint8Arrays, etc.
 */
export * from './bytes'
export * from './constants'
/**
 * Errors
 */
export * from './errors'
export * from './hash'
export * from './helpers'
export * from './safe'
/**
 * Helpful TypeScript types
 */
export * from './types'
