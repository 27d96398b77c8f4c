/**
 * Filter types
 */

import type { Pipeline, Raster } from '@pixelflow/core'

/** Convolution by a kernel declared as its own pipeline */
export interface ConvolutedFilter<R extends Raster<R>> {
	kind: 'convoluted'
	/** Must ignore the requested size; materialized with generate(0, 0) */
	kernel: Pipeline<R>
}

/** Min/max approximation of a median over a size x size window */
export interface MedianFilter {
	kind: 'median'
	size: number
}

export type Filter<R extends Raster<R>> = ConvolutedFilter<R> | MedianFilter

/**
 * Source of noise pipelines and parametric kernels, keyed by one size
 */
export interface Generator<R extends Raster<R>> {
	readonly size: number
	gaussianNoise(mean: number, variance: number, intensity: number): Pipeline<R>
	saltAndPepperNoise(variance: number): Pipeline<R>
	averageNeedle(): Filter<R>
	gaussianNeedle(variance: number): Filter<R>
}
