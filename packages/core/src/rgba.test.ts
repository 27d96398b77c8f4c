import { describe, expect, it } from 'vitest'
import { Rgba } from './rgba'

function expectPixel(pixel: Rgba, expected: [number, number, number, number]): void {
	const actual = pixel.toArray()
	for (let i = 0; i < 4; i++) {
		expect(actual[i]).toBeCloseTo(expected[i], 10)
	}
}

describe('Rgba', () => {
	describe('arithmetic', () => {
		it('should add and subtract every channel, alpha included', () => {
			const a = new Rgba(0.1, 0.2, 0.3, 0.4)
			const b = new Rgba(0.5, 0.5, 0.5, 0.5)

			expectPixel(a.add(b), [0.6, 0.7, 0.8, 0.9])
			expectPixel(b.sub(a), [0.4, 0.3, 0.2, 0.1])
			expectPixel(Rgba.WHITE.sub(Rgba.WHITE), [0, 0, 0, 0])
		})

		it('should multiply by a pixel and divide by a scalar', () => {
			const pixel = new Rgba(0.2, 0.4, 0.6, 0.8)

			expectPixel(pixel.mul(new Rgba(2, 0.5, 0, 1)), [0.4, 0.2, 0, 0.8])
			expectPixel(pixel.div(2), [0.1, 0.2, 0.3, 0.4])
		})

		it('should take channel-wise min and max', () => {
			const a = new Rgba(0.1, 0.9, 0.5, 1)
			const b = new Rgba(0.4, 0.2, 0.5, 0)

			expect(a.min(b).toArray()).toEqual([0.1, 0.2, 0.5, 0])
			expect(a.max(b).toArray()).toEqual([0.4, 0.9, 0.5, 1])
		})

		it('should allow values outside [0, 1]', () => {
			expect(Rgba.WHITE.add(Rgba.WHITE).toArray()).toEqual([2, 2, 2, 2])
			expect(Rgba.WHITE.map((c) => -c).toArray()).toEqual([-1, -1, -1, -1])
		})
	})

	describe('grayscale', () => {
		it('should average the weighted channels and keep alpha', () => {
			const pixel = new Rgba(1, 1, 1, 0.5).grayscale()
			const mean = (0.3 + 0.59 + 0.11) / 3

			expectPixel(pixel, [mean, mean, mean, 0.5])
		})

		it('should weight red, green and blue differently', () => {
			const red = Rgba.RED.grayscale()
			const green = Rgba.GREEN.grayscale()

			expect(red.r).toBeCloseTo(0.1, 10)
			expect(green.r).toBeCloseTo(0.59 / 3, 10)
		})
	})

	describe('ordering', () => {
		it('should compare channels lexicographically', () => {
			expect(Rgba.gray(0.2).lessThan(Rgba.gray(0.3))).toBe(true)
			expect(Rgba.gray(0.3).lessThan(Rgba.gray(0.2))).toBe(false)
			expect(Rgba.gray(0.3).lessThan(Rgba.gray(0.3))).toBe(false)
			expect(new Rgba(0.5, 0, 0, 1).lessThan(new Rgba(0.5, 0.1, 0, 1))).toBe(true)
		})

		it('should compare blue before green', () => {
			const side = new Rgba(0.5, 0.3, 0.1, 1)
			const center = new Rgba(0.5, 0.2, 0.8, 1)

			expect(side.lessThan(center)).toBe(true)
			expect(center.lessThan(side)).toBe(false)
		})
	})

	describe('bytes', () => {
		it('should divide bytes by 256', () => {
			expect(Rgba.fromBytes(128, 64, 0, 255).toArray()).toEqual([0.5, 0.25, 0, 255 / 256])
		})

		it('should clamp, scale by 256 and saturate at 255', () => {
			expect(new Rgba(-0.5, 0.5, 2, 0.25).toBytes()).toEqual([0, 128, 255, 64])
			expect(Rgba.WHITE.toBytes()).toEqual([255, 255, 255, 255])
			expect(Rgba.gray(0.999).toBytes()).toEqual([255, 255, 255, 255])
		})
	})

	describe('constants', () => {
		it('should expose the palette', () => {
			expect(Rgba.COLOURS).toHaveLength(7)
			expect(Rgba.COLOURS[0]).toBe(Rgba.BLACK)
			expect(Rgba.gray(0.3).toArray()).toEqual([0.3, 0.3, 0.3, 1])
		})
	})
})
