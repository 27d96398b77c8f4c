import type { GenericOperator, Pipeline, Raster } from '@pixelflow/core'
import { CpuGenerator, filter } from '@pixelflow/filter'
import { gradient } from './gradient'
import { quantize } from './quantize'
import { nonMaxSuppress } from './suppress'

const BLUR_SIZE = 5
const BLUR_VARIANCE = 0.6

/**
 * Gaussian blur
 *
 * Always the 5x5 kernel with variance 0.6; `size` and `variance` are accepted
 * and ignored.
 */
export function gaussianBlur(_size: number, _variance: number): GenericOperator {
	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline.pipe(filter(new CpuGenerator(BLUR_SIZE, pipeline.factory).gaussianNeedle(BLUR_VARIANCE)))
}

/**
 * Canny-style edge detection:
 * grayscale, blur, gradient, non-max suppression, quantize
 */
export function canny(thresholds: readonly number[]): GenericOperator {
	const quantized = quantize(thresholds)
	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline
			.grayscale()
			.pipe(gaussianBlur(BLUR_SIZE, BLUR_VARIANCE), gradient(), nonMaxSuppress(), quantized)
}
