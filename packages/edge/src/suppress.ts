import { type GenericOperator, type Pipeline, type Raster, Rgba } from '@pixelflow/core'

type Point = readonly [number, number]

/**
 * Keep pixels that are a strict local maximum along at least one of the
 * diagonals, the horizontal or the vertical; black out the rest
 */
export function nonMaxSuppress(): GenericOperator {
	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline.commit((image) =>
			image.similar((x, y) => {
				const center = image.get(x, y)
				const isPeak = (previous: Point, next: Point): boolean =>
					image.get(...previous).lessThan(center) && image.get(...next).lessThan(center)

				const xp = Math.max(x - 1, 0)
				const xn = Math.min(x + 1, image.width - 1)
				const yp = Math.max(y - 1, 0)
				const yn = Math.min(y + 1, image.height - 1)

				if (
					isPeak([xp, yp], [xn, yn]) ||
					isPeak([xp, y], [xn, y]) ||
					isPeak([x, yp], [x, yn]) ||
					isPeak([xp, yn], [xn, yp])
				) {
					return center
				}
				return Rgba.BLACK
			})
		)
}
