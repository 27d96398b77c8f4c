/**
 * Noise fields
 *
 * Both generators ignore the pixels of their input and only keep its size.
 * The result is meant to be mixed in with `Pipeline.ennoise` or `Pipeline.add`.
 */

import {
	type GenericOperator,
	type Pipeline,
	type RandomSource,
	type Raster,
	Rgba,
	defaultRandom,
	gaussianDensity,
} from '@pixelflow/core'

/** Density above which salt-and-pepper pushes a pixel to an extreme */
export const SALT_AND_PEPPER_THRESHOLD = 0.6

/**
 * Gray noise: 0.5 plus or minus density(u) * intensity, sign by coin flip
 */
export function gaussianNoise(
	mean: number,
	variance: number,
	intensity: number,
	random: RandomSource = defaultRandom
): GenericOperator {
	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline.commit((image) =>
			image.similar(() => {
				const offset = gaussianDensity(random(), mean, variance) * intensity
				return Rgba.gray(0.5 + (random() < 0.5 ? offset : -offset))
			})
		)
}

/**
 * Impulse noise: white or black where the density of u exceeds the threshold,
 * neutral gray elsewhere
 */
export function saltAndPepperNoise(variance: number, random: RandomSource = defaultRandom): GenericOperator {
	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline.commit((image) =>
			image.similar(() => {
				if (gaussianDensity(random(), 0.5, variance) > SALT_AND_PEPPER_THRESHOLD) {
					return random() < 0.5 ? Rgba.WHITE : Rgba.BLACK
				}
				return Rgba.gray(0.5)
			})
		)
}
