import { type GenericOperator, type Pipeline, type Raster, Rgba, combinators } from '@pixelflow/core'
import { convolve } from '@pixelflow/filter'

const NEGATIVE_WHITE = Rgba.WHITE.map((channel) => -channel)

/**
 * Directional-difference kernel
 *
 *    0  -1   0
 *   -1   0   1
 *    0   1   0
 */
function gradientKernel(x: number, y: number): Rgba {
	switch (`${x},${y}`) {
		case '0,0':
		case '1,1':
		case '2,2':
		case '0,2':
		case '2,0':
			return Rgba.BLACK
		case '1,0':
		case '0,1':
			return NEGATIVE_WHITE
		case '1,2':
		case '2,1':
			return Rgba.WHITE
		default:
			throw new RangeError(`Invalid gradient kernel index (x = ${x}, y = ${y})`)
	}
}

/**
 * Absolute directional difference (not a Sobel operator)
 */
export function gradient(): GenericOperator {
	const differences = convolve(3, 3, gradientKernel, combinators.add)
	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		differences(pipeline).commit((image) =>
			image.similar((x, y) => image.get(x, y).map(Math.abs))
		)
}
