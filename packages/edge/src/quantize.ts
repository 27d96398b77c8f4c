import { type GenericOperator, type Pipeline, type Raster, Rgba } from '@pixelflow/core'

interface Level {
	readonly threshold: number
	readonly pixel: Rgba
}

/**
 * Map the mean of r, g and b onto discrete gray levels
 *
 * Thresholds are walked from the last to the first, followed by a 0 sentinel;
 * the first one met picks level index / thresholds.length. Intensities at or
 * above the last threshold therefore come out black and intensities below
 * every threshold come out white.
 */
export function quantize(thresholds: readonly number[]): GenericOperator {
	if (thresholds.length === 0) {
		throw new RangeError('quantize needs at least one threshold')
	}

	const levels: Level[] = [...thresholds].reverse().concat(0).map((threshold, n) => ({
		threshold,
		pixel: Rgba.gray(n / thresholds.length),
	}))

	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline.commit((image) =>
			image.similar((x, y) => {
				const { r, g, b } = image.get(x, y)
				const intensity = (r + g + b) / 3
				const level = levels.find(({ threshold }) => intensity >= threshold)
				if (!level) {
					throw new RangeError(`Intensity ${intensity} at (${x}, ${y}) is below every threshold`)
				}
				return level.pixel
			})
		)
}
