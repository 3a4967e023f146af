export { z } from 'zod'
export * from './address'
export * from './bigint'
export * from './bytes'
export * from './path'
