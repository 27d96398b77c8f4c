import { Rgba } from './rgba'
import type { ImageData, PixelFn, Raster, RasterFactory } from './types'

/**
 * Dense CPU raster, row-major, immutable
 */
export class Image implements Raster<Image> {
	private constructor(
		readonly width: number,
		readonly height: number,
		private readonly pixels: readonly Rgba[]
	) {}

	/**
	 * Build an image by evaluating fn for every coordinate
	 */
	static construct(width: number, height: number, fn: PixelFn): Image {
		assertDimension('width', width)
		assertDimension('height', height)

		const pixels: Rgba[] = new Array(width * height)
		for (let y = 0; y < height; y++) {
			for (let x = 0; x < width; x++) {
				pixels[y * width + x] = fn(x, y)
			}
		}
		return new Image(width, height, pixels)
	}

	static fromPixel(width: number, height: number, pixel: Rgba): Image {
		return Image.construct(width, height, () => pixel)
	}

	static black(width: number, height: number): Image {
		return Image.fromPixel(width, height, Rgba.BLACK)
	}

	/**
	 * Unpack a 4-byte-per-pixel buffer
	 */
	static fromImageData(image: ImageData): Image {
		const { width, height, data } = image
		if (data.length !== width * height * 4) {
			throw new RangeError(
				`Expected ${width * height * 4} bytes for a ${width}x${height} image, got ${data.length}`
			)
		}
		return Image.construct(width, height, (x, y) => {
			const idx = (y * width + x) * 4
			return Rgba.fromBytes(data[idx], data[idx + 1], data[idx + 2], data[idx + 3])
		})
	}

	get(x: number, y: number): Rgba {
		if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
			throw new RangeError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} image`)
		}
		return this.pixels[y * this.width + x]
	}

	similar(fn: PixelFn): Image {
		return Image.construct(this.width, this.height, fn)
	}

	toImageData(): ImageData {
		return { width: this.width, height: this.height, data: this.toRgba8() }
	}

	toRgba8(): Uint8Array {
		const data = new Uint8Array(this.pixels.length * 4)
		this.pixels.forEach((pixel, i) => {
			data.set(pixel.toBytes(), i * 4)
		})
		return data
	}

	equals(other: Image): boolean {
		return (
			this.width === other.width &&
			this.height === other.height &&
			this.pixels.every((pixel, i) => pixel.equals(other.pixels[i]))
		)
	}
}

/**
 * RasterFactory for the CPU image
 */
export const ImageFactory: RasterFactory<Image> = {
	construct: (width, height, fn) => Image.construct(width, height, fn),
	black: (width, height) => Image.black(width, height),
}

function assertDimension(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new RangeError(`Invalid image ${name}: ${value}`)
	}
}
