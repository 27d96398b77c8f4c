import {
	Pipeline,
	type RandomSource,
	type Raster,
	type RasterFactory,
	defaultRandom,
} from '@pixelflow/core'
import { gaussianNoise, saltAndPepperNoise } from '@pixelflow/noise'
import { averageNeedle, gaussianNeedle } from './filters'
import type { Filter, Generator } from './types'

/**
 * Generator over any raster factory
 *
 * `size` is the kernel edge for needles. Noise pipelines take their size from
 * whatever they are applied to.
 */
export class CpuGenerator<R extends Raster<R>> implements Generator<R> {
	constructor(
		readonly size: number,
		readonly factory: RasterFactory<R>,
		readonly random: RandomSource = defaultRandom
	) {}

	gaussianNoise(mean: number, variance: number, intensity: number): Pipeline<R> {
		return Pipeline.over(this.factory).pipe(gaussianNoise(mean, variance, intensity, this.random))
	}

	saltAndPepperNoise(variance: number): Pipeline<R> {
		return Pipeline.over(this.factory).pipe(saltAndPepperNoise(variance, this.random))
	}

	averageNeedle(): Filter<R> {
		return averageNeedle(this.factory, this.size)
	}

	gaussianNeedle(variance: number): Filter<R> {
		return gaussianNeedle(this.factory, this.size, variance)
	}
}
