/**
 * Kernel filters and needle kernels
 */

import {
	Pipeline,
	type Operator,
	type Raster,
	type RasterFactory,
	Rgba,
	combinators,
	gaussianDensity,
} from '@pixelflow/core'
import { convolveBy } from './convolve'
import type { ConvolutedFilter, Filter, MedianFilter } from './types'

/**
 * Apply a filter
 */
export function filter<R extends Raster<R>>(needle: Filter<R>): Operator<R> {
	switch (needle.kind) {
		case 'convoluted':
			return convoluted(needle)
		case 'median':
			return median(needle)
	}
}

/**
 * Median filter over a size x size window
 */
export function medianFilter(size: number): MedianFilter {
	assertSize(size)
	return { kind: 'median', size }
}

function convoluted<R extends Raster<R>>(needle: ConvolutedFilter<R>): Operator<R> {
	return (pipeline) =>
		pipeline.commit((image) => {
			const kernel = needle.kernel.generate(0, 0)
			return Pipeline.over(pipeline.factory).pipe(convolveBy(kernel, combinators.add)).apply(image)
		})
}

// Not an order statistic: the mean of the window's minimum and maximum
function median<R extends Raster<R>>(needle: MedianFilter): Operator<R> {
	assertSize(needle.size)
	return (pipeline) =>
		pipeline.commit((image) => {
			const window = pipeline.factory.construct(needle.size, needle.size, () => Rgba.WHITE)
			const low = Pipeline.over(pipeline.factory).pipe(convolveBy(window, combinators.min)).apply(image)
			const high = Pipeline.over(pipeline.factory).pipe(convolveBy(window, combinators.max)).apply(image)
			return image.similar((x, y) => low.get(x, y).add(high.get(x, y)).div(2))
		})
}

/**
 * Radially symmetric Gaussian kernel of the given odd size
 *
 * Each cell weighs the normal density of its distance from the centre, with
 * `variance` as the spread. Weights are not normalized.
 */
export function gaussianNeedle<R extends Raster<R>>(
	factory: RasterFactory<R>,
	size: number,
	variance: number
): ConvolutedFilter<R> {
	assertOddSize(size)
	const center = Math.floor(size / 2)
	return {
		kind: 'convoluted',
		kernel: Pipeline.over(factory).commit(() =>
			factory.construct(size, size, (i, j) => {
				const distance = Math.hypot(i - center, j - center)
				return Rgba.gray(gaussianDensity(distance, 0, variance))
			})
		),
	}
}

/**
 * Box kernel, every cell weighing 1 / size²
 */
export function averageNeedle<R extends Raster<R>>(factory: RasterFactory<R>, size: number): ConvolutedFilter<R> {
	assertOddSize(size)
	const weight = Rgba.gray(1 / (size * size))
	return {
		kind: 'convoluted',
		kernel: Pipeline.over(factory).commit(() => factory.construct(size, size, () => weight)),
	}
}

function assertSize(size: number): void {
	if (!Number.isInteger(size) || size < 1) {
		throw new RangeError(`Invalid filter size: ${size}`)
	}
}

function assertOddSize(size: number): void {
	assertSize(size)
	if (size % 2 === 0) {
		throw new RangeError(`Kernel size must be odd, got ${size}`)
	}
}
