/**
 * @pixelflow/core - Pixels, rasters and the deferred pipeline
 */

export * from './types'
export * from './rgba'
export * from './image'
export * from './pipeline'
export * from './math'
export * from './random'
export * as combinators from './combinators'
