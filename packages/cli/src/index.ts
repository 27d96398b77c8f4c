#!/usr/bin/env node
/**
 * pixelflow CLI - apply a chain of raster operations to one image
 */

import { resolve } from 'node:path'
import { defaultRandom, mulberry32 } from '@pixelflow/core'
import { type CliOptions, type ParsedArgs, parseArgs } from './args'
import { loadImage, saveImage } from './io'
import { buildPipeline } from './operations'

const VERSION = '0.1.0'

const HELP = `
pixelflow - Deferred image transform pipeline

USAGE:
  pixelflow <input> <output> [operation...] [flags]

Operations run in the order given.

OPERATIONS:
  --gaussian-blur=<size>    Gaussian blur (even sizes round up to odd)
  --average-blur=<size>     Box blur (even sizes round up to odd)
  --median=<size>           Min/max median approximation over size x size
  --gaussian-noise=<v>      Add Gaussian noise
  --impulse-noise=<v>       Add salt-and-pepper noise
  --canny[=<t1,t2,...>]     Canny-style edge detection (default threshold 0.0)
  --grayscale               Luminance grayscale
  --gradient                Absolute directional gradient
  --invert                  Invert every channel

FLAGS:
  --seed=<n>                Seed the noise generators
  -v, --verbose             Verbose output
  --quiet                   Suppress output
  --help                    Show this help
  --version                 Show version

EXAMPLES:
  pixelflow photo.png edges.png --canny=0.2,0.5
  pixelflow photo.jpg noisy.png --impulse-noise=0.1 --median=3
`

async function run(input: string, output: string, args: ParsedArgs): Promise<void> {
	const options: CliOptions = args.options
	const log = (message: string): void => {
		if (!options.quiet) console.log(message)
	}

	log(`Loading image ${input}`)
	const image = await loadImage(resolve(input))

	const random = options.seed === undefined ? defaultRandom : mulberry32(options.seed)
	const pipeline = buildPipeline(args.operations, image, random)
	if (options.verbose) {
		for (const operation of args.operations) {
			log(`  ${operation.name}`)
		}
	}

	log(`Calculating (${pipeline.length} steps)`)
	const start = performance.now()
	const result = pipeline.apply(image)
	log(`Calculated: ${result.width}x${result.height}`)
	if (options.verbose) {
		log(`       Time: ${(performance.now() - start).toFixed(0)}ms`)
	}

	await saveImage(result, resolve(output))
	log(`Saved ${output}`)
}

async function main(): Promise<void> {
	let args: ParsedArgs
	try {
		args = parseArgs(process.argv.slice(2))
	} catch (err) {
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
		process.exit(1)
	}

	if (args.options.help) {
		console.log(HELP)
		return
	}

	if (args.options.version) {
		console.log(`pixelflow v${VERSION}`)
		return
	}

	const [input, output] = args.inputs
	if (input === undefined || output === undefined || args.inputs.length > 2) {
		console.error('Error: expected <input> and <output> paths')
		console.log(HELP)
		process.exit(1)
	}

	await run(input, output, args)
}

main().catch((err) => {
	console.error('Fatal error:', err)
	process.exit(1)
})
