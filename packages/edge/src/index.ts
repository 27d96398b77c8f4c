/**
 * @pixelflow/edge - Gradient, non-max suppression and Canny-style edges
 */

export * from './gradient'
export * from './suppress'
export * from './quantize'
export * from './canny'
