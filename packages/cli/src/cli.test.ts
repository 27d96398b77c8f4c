import { Image, Rgba, mulberry32 } from '@pixelflow/core'
import { describe, expect, it } from 'vitest'
import { parseArgs } from './args'
import { buildPipeline } from './operations'

describe('CLI', () => {
	describe('parseArgs', () => {
		it('should split paths, operations and flags', () => {
			const { inputs, operations, options } = parseArgs([
				'in.png',
				'out.png',
				'--grayscale',
				'--canny=0.2,0.5',
				'-v',
				'--seed=42',
			])

			expect(inputs).toEqual(['in.png', 'out.png'])
			expect(operations).toEqual([
				{ name: 'grayscale' },
				{ name: 'canny', thresholds: [0.2, 0.5] },
			])
			expect(options).toEqual({ verbose: true, seed: 42 })
		})

		it('should round blur sizes up to odd', () => {
			const { operations } = parseArgs(['--gaussian-blur=4', '--average-blur=2', '--average-blur=3'])

			expect(operations[0]).toEqual({ name: 'gaussian-blur', size: 5, variance: 0.6 })
			expect(operations[1]).toEqual({ name: 'average-blur', size: 3 })
			expect(operations[2]).toEqual({ name: 'average-blur', size: 3 })
		})

		it('should default canny to a zero threshold', () => {
			expect(parseArgs(['--canny']).operations).toEqual([{ name: 'canny', thresholds: [0] }])
		})

		it('should parse noise options', () => {
			const { operations } = parseArgs(['--gaussian-noise=2', '--impulse-noise=0.1', '--median=3'])

			expect(operations).toEqual([
				{ name: 'gaussian-noise', variance: 2 },
				{ name: 'impulse-noise', variance: 0.1 },
				{ name: 'median', size: 3 },
			])
		})

		it('should reject unknown options', () => {
			expect(() => parseArgs(['--sharpen'])).toThrow("Unexpected option '--sharpen'")
		})

		it('should reject missing and invalid values', () => {
			expect(() => parseArgs(['--median'])).toThrow('Expected a value for --median')
			expect(() => parseArgs(['--median=0'])).toThrow('Invalid median size: 0')
			expect(() => parseArgs(['--gaussian-blur=abc'])).toThrow('Invalid gaussian blur size: abc')
			expect(() => parseArgs(['--impulse-noise=-1'])).toThrow('Invalid noise variance: -1')
			expect(() => parseArgs(['--canny=0.2,,0.5'])).toThrow('Invalid threshold: ')
			expect(() => parseArgs(['--seed=1.5'])).toThrow('Invalid seed: 1.5')
		})
	})

	describe('buildPipeline', () => {
		it('should apply operations in order', () => {
			const img = Image.fromPixel(2, 2, Rgba.gray(0.25))
			const pipeline = buildPipeline([{ name: 'invert' }, { name: 'median', size: 3 }], img)

			expect(pipeline.length).toBe(2)
			expect(pipeline.apply(img).get(1, 1).r).toBe(0.75)
		})

		it('should build edge detection', () => {
			const img = Image.fromPixel(4, 4, Rgba.gray(0.3))
			const result = buildPipeline([{ name: 'canny', thresholds: [0.5] }], img).apply(img)

			expect(result.get(2, 2).toArray()).toEqual([1, 1, 1, 1])
		})

		it('should add reproducible noise with a seeded source', () => {
			const img = Image.fromPixel(8, 8, Rgba.gray(0.5))
			const operations = [{ name: 'impulse-noise', variance: 0.2 }] as const

			const first = buildPipeline(operations, img, mulberry32(5)).apply(img)
			const second = buildPipeline(operations, img, mulberry32(5)).apply(img)

			expect(first.equals(second)).toBe(true)
			for (let y = 0; y < 8; y++) {
				for (let x = 0; x < 8; x++) {
					expect([-0.5, 0.5, 1.5]).toContain(first.get(x, y).r)
				}
			}
		})

		it('should blur with a generator-built needle', () => {
			const img = Image.fromPixel(3, 3, Rgba.gray(0.5))
			const result = buildPipeline([{ name: 'average-blur', size: 3 }], img).apply(img)

			expect(result.get(1, 1).r).toBeCloseTo(0.5, 12)
		})
	})
})
