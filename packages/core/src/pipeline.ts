import { Rgba } from './rgba'
import type { Raster, RasterFactory, Step } from './types'

/**
 * Function that extends a pipeline with more steps
 */
export type Operator<R extends Raster<R>> = (pipeline: Pipeline<R>) => Pipeline<R>

/**
 * Operator usable with any raster representation
 */
export type GenericOperator = <R extends Raster<R>>(pipeline: Pipeline<R>) => Pipeline<R>

/**
 * Joins two pipelines into one that evaluates both against the same input
 */
export type Combinator = <R extends Raster<R>>(left: Pipeline<R>, right: Pipeline<R>) => Pipeline<R>

const NEUTRAL_GRAY = Rgba.gray(0.5)
const TWO = Rgba.gray(2)

/**
 * Deferred sequence of raster transforms
 *
 * Every builder method returns a new pipeline; nothing runs until
 * `apply` or `generate`.
 */
export class Pipeline<R extends Raster<R>> {
	private constructor(
		readonly factory: RasterFactory<R>,
		private readonly steps: readonly Step<R>[]
	) {}

	/**
	 * Empty pipeline for a raster representation
	 */
	static over<R extends Raster<R>>(factory: RasterFactory<R>): Pipeline<R> {
		return new Pipeline(factory, [])
	}

	get length(): number {
		return this.steps.length
	}

	commit(step: Step<R>): Pipeline<R> {
		return new Pipeline(this.factory, [...this.steps, step])
	}

	pipe(...operators: Operator<R>[]): Pipeline<R> {
		return operators.reduce<Pipeline<R>>((acc, op) => op(acc), this)
	}

	/**
	 * Run every step, left to right
	 */
	apply(image: R): R {
		return this.steps.reduce((acc, step) => step(acc), image)
	}

	/**
	 * Apply to a black raster of the given size
	 */
	generate(width: number, height: number): R {
		return this.apply(this.factory.black(width, height))
	}

	/**
	 * Sample each pixel from (x + dx, y + dy), replicating the nearest edge
	 */
	offset(dx: number, dy: number): Pipeline<R> {
		return this.commit((image) =>
			image.similar((x, y) =>
				image.get(clampIndex(x + dx, image.width), clampIndex(y + dy, image.height))
			)
		)
	}

	dim(factor: Rgba): Pipeline<R> {
		return this.commit((image) => image.similar((x, y) => image.get(x, y).mul(factor)))
	}

	/**
	 * Evaluate `other` on the same input and merge pixel by pixel
	 */
	combine(other: Pipeline<R>, op: (left: Rgba, right: Rgba) => Rgba): Pipeline<R> {
		return this.commit((image) => {
			const right = other.apply(image)
			return image.similar((x, y) => op(image.get(x, y), right.get(x, y)))
		})
	}

	add(other: Pipeline<R>): Pipeline<R> {
		return this.combine(other, (left, right) => left.add(right))
	}

	/**
	 * Subtract, keeping the left operand's alpha
	 */
	sub(other: Pipeline<R>): Pipeline<R> {
		return this.combine(other, (left, right) => left.sub(right).withAlpha(left.a))
	}

	min(other: Pipeline<R>): Pipeline<R> {
		return this.combine(other, (left, right) => left.min(right))
	}

	max(other: Pipeline<R>): Pipeline<R> {
		return this.combine(other, (left, right) => left.max(right))
	}

	/**
	 * Add a noise field centred on 0.5, rescaled to [-1, 1]
	 */
	ennoise(noise: Pipeline<R>): Pipeline<R> {
		return this.combine(noise, (pixel, sample) => pixel.add(sample.sub(NEUTRAL_GRAY).mul(TWO)))
	}

	invert(): Pipeline<R> {
		return this.commit((image) => image.similar((x, y) => Rgba.WHITE.sub(image.get(x, y))))
	}

	// Luminance weights end up applied twice: once here, once in Rgba.grayscale
	grayscale(): Pipeline<R> {
		return this.dim(Rgba.GRAYSCALE_FACTOR).commit((image) =>
			image.similar((x, y) => image.get(x, y).grayscale())
		)
	}
}

function clampIndex(value: number, size: number): number {
	return Math.max(0, Math.min(size - 1, value))
}
