import type { Rgba } from './rgba'

/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255), rows top to bottom
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Pixel generator, called once per coordinate
 */
export type PixelFn = (x: number, y: number) => Rgba

/**
 * Anything that can be read pixel by pixel
 */
export interface PixelGrid {
	readonly width: number
	readonly height: number
	/** Throws a RangeError outside [0, width) x [0, height) */
	get(x: number, y: number): Rgba
}

/**
 * Raster representation the pipeline is written against
 */
export interface Raster<R extends Raster<R>> extends PixelGrid {
	/** Same dimensions, new content */
	similar(fn: PixelFn): R
}

/**
 * Construct-from-blank capability of a raster representation
 */
export interface RasterFactory<R extends Raster<R>> {
	construct(width: number, height: number, fn: PixelFn): R
	black(width: number, height: number): R
}

/**
 * Single pipeline step
 */
export type Step<R> = (input: R) => R

/**
 * Uniform random number in [0, 1)
 */
export type RandomSource = () => number
