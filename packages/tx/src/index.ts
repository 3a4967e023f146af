export * from './authorization'
export * from './config'
export * from './decode'
export * from './message'
export * from './params'
export * from './request'
export * from './resolve'
export * from './signer/private-key'
export * from './signer/recover'
export * from './signer/request'
export type { Signer, SignOptions } from './signer/types'
export * from './signing'
export * from './tx'
export * from './types'
