/**
 * Convolution operations
 *
 * A kernel of kw x kh cells becomes kw * kh shifted, weighted copies of the
 * input which are folded together by a pipeline combinator. `add` gives a
 * weighted sum, `min` and `max` give erosion and dilation.
 */

import {
	type Combinator,
	type GenericOperator,
	Pipeline,
	type PixelFn,
	type PixelGrid,
	type Raster,
} from '@pixelflow/core'

/**
 * Convolve with a kernel given as a function of the kernel cell
 */
export function convolve(
	kernelWidth: number,
	kernelHeight: number,
	kernel: PixelFn,
	combinator: Combinator
): GenericOperator {
	assertKernelSize(kernelWidth, kernelHeight)
	const halfW = Math.floor(kernelWidth / 2)
	const halfH = Math.floor(kernelHeight / 2)

	return <R extends Raster<R>>(pipeline: Pipeline<R>): Pipeline<R> =>
		pipeline.commit((image) => {
			const copies: Pipeline<R>[] = []
			for (let kx = 0; kx < kernelWidth; kx++) {
				for (let ky = 0; ky < kernelHeight; ky++) {
					const weight = kernel(kx, ky)
					copies.push(
						Pipeline.over(pipeline.factory)
							.commit(() => image)
							.offset(kx - halfW, ky - halfH)
							.dim(weight)
					)
				}
			}
			return copies
				.reduce((acc, copy) => combinator(acc, copy))
				.generate(image.width, image.height)
		})
}

/**
 * Convolve with a materialized kernel raster
 */
export function convolveBy(kernel: PixelGrid, combinator: Combinator): GenericOperator {
	return convolve(kernel.width, kernel.height, (x, y) => kernel.get(x, y), combinator)
}

function assertKernelSize(width: number, height: number): void {
	if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
		throw new RangeError(`Invalid kernel size: ${width}x${height}`)
	}
}
