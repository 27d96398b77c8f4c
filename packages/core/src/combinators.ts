import type { Pipeline } from './pipeline'
import type { Raster } from './types'

/**
 * Pipeline combinators, used to fold convolution copies together
 */

export function add<R extends Raster<R>>(left: Pipeline<R>, right: Pipeline<R>): Pipeline<R> {
	return left.add(right)
}

export function min<R extends Raster<R>>(left: Pipeline<R>, right: Pipeline<R>): Pipeline<R> {
	return left.min(right)
}

export function max<R extends Raster<R>>(left: Pipeline<R>, right: Pipeline<R>): Pipeline<R> {
	return left.max(right)
}
