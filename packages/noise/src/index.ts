/**
 * @pixelflow/noise - Random perturbation fields
 */

export * from './noise'
