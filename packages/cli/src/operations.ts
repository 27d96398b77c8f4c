import {
	type Image,
	ImageFactory,
	type Operator,
	Pipeline,
	type RandomSource,
	defaultRandom,
} from '@pixelflow/core'
import { canny, gradient } from '@pixelflow/edge'
import { CpuGenerator, filter, medianFilter } from '@pixelflow/filter'
import type { Operation } from './args'

const GAUSSIAN_NOISE_MEAN = 0.5
const GAUSSIAN_NOISE_INTENSITY = 0.7

/**
 * Translate one parsed operation into a pipeline operator
 *
 * Noise generators are keyed by the larger image dimension.
 */
export function toOperator(operation: Operation, image: Image, random: RandomSource): Operator<Image> {
	const noiseSize = Math.max(image.width, image.height)

	switch (operation.name) {
		case 'gaussian-blur':
			return filter(new CpuGenerator(operation.size, ImageFactory).gaussianNeedle(operation.variance))
		case 'average-blur':
			return filter(new CpuGenerator(operation.size, ImageFactory).averageNeedle())
		case 'median':
			return filter<Image>(medianFilter(operation.size))
		case 'gaussian-noise': {
			const noise = new CpuGenerator(noiseSize, ImageFactory, random).gaussianNoise(
				GAUSSIAN_NOISE_MEAN,
				1 / operation.variance,
				GAUSSIAN_NOISE_INTENSITY
			)
			return (pipeline) => pipeline.ennoise(noise)
		}
		case 'impulse-noise': {
			const noise = new CpuGenerator(noiseSize, ImageFactory, random).saltAndPepperNoise(operation.variance)
			return (pipeline) => pipeline.ennoise(noise)
		}
		case 'canny':
			return canny(operation.thresholds)
		case 'grayscale':
			return (pipeline) => pipeline.grayscale()
		case 'gradient':
			return gradient()
		case 'invert':
			return (pipeline) => pipeline.invert()
	}
}

/**
 * Build the pipeline for a list of operations, in order
 */
export function buildPipeline(
	operations: readonly Operation[],
	image: Image,
	random: RandomSource = defaultRandom
): Pipeline<Image> {
	return Pipeline.over(ImageFactory).pipe(...operations.map((operation) => toOperator(operation, image, random)))
}
