/**
 * @pixelflow/filter - Convolution, kernel filters and generators
 */

export * from './types'
export * from './convolve'
export * from './filters'
export * from './generator'
