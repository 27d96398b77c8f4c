const SQRT_TWO_PI = Math.sqrt(2 * Math.PI)

/**
 * Normal probability density at x
 *
 * `scale` is the spread of the bell curve (standard deviation).
 */
export function gaussianDensity(x: number, mean: number, scale: number): number {
	const z = (x - mean) / scale
	return Math.exp(-0.5 * z * z) / (scale * SQRT_TWO_PI)
}
