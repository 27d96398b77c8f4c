/**
 * Command-line parsing
 *
 * Operations use the `--name[=value]` form and are kept in the order given.
 */

export type Operation =
	| { name: 'gaussian-blur'; size: number; variance: number }
	| { name: 'average-blur'; size: number }
	| { name: 'median'; size: number }
	| { name: 'gaussian-noise'; variance: number }
	| { name: 'impulse-noise'; variance: number }
	| { name: 'canny'; thresholds: number[] }
	| { name: 'grayscale' }
	| { name: 'gradient' }
	| { name: 'invert' }

export interface CliOptions {
	seed?: number
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	inputs: string[]
	operations: Operation[]
	options: CliOptions
}

export function parseArgs(args: readonly string[]): ParsedArgs {
	const inputs: string[] = []
	const operations: Operation[] = []
	const options: CliOptions = {}

	for (const arg of args) {
		if (!arg.startsWith('-')) {
			inputs.push(arg)
			continue
		}

		const eq = arg.indexOf('=')
		const name = eq === -1 ? arg : arg.slice(0, eq)
		const value = eq === -1 ? undefined : arg.slice(eq + 1)

		switch (name) {
			case '--help':
			case '-?':
				options.help = true
				break
			case '--version':
			case '-V':
				options.version = true
				break
			case '--verbose':
			case '-v':
				options.verbose = true
				break
			case '--quiet':
				options.quiet = true
				break
			case '--seed':
				options.seed = parseInteger(required(name, value), 'seed')
				break
			case '--gaussian-blur': {
				const size = toOdd(parseSize(required(name, value), 'gaussian blur size'))
				operations.push({ name: 'gaussian-blur', size, variance: size / 10 + 0.1 })
				break
			}
			case '--average-blur':
				operations.push({
					name: 'average-blur',
					size: toOdd(parseSize(required(name, value), 'average blur size')),
				})
				break
			case '--median':
				operations.push({ name: 'median', size: parseSize(required(name, value), 'median size') })
				break
			case '--gaussian-noise':
				operations.push({
					name: 'gaussian-noise',
					variance: parsePositive(required(name, value), 'noise variance'),
				})
				break
			case '--impulse-noise':
				operations.push({
					name: 'impulse-noise',
					variance: parsePositive(required(name, value), 'noise variance'),
				})
				break
			case '--canny':
				operations.push({ name: 'canny', thresholds: parseThresholds(value ?? '0.0') })
				break
			case '--grayscale':
				operations.push({ name: 'grayscale' })
				break
			case '--gradient':
				operations.push({ name: 'gradient' })
				break
			case '--invert':
				operations.push({ name: 'invert' })
				break
			default:
				throw new Error(`Unexpected option '${arg}'`)
		}
	}

	return { inputs, operations, options }
}

function required(option: string, value: string | undefined): string {
	if (value === undefined || value === '') {
		throw new Error(`Expected a value for ${option}`)
	}
	return value
}

function parseNumber(value: string, what: string): number {
	const n = Number(value)
	if (value.trim() === '' || !Number.isFinite(n)) {
		throw new Error(`Invalid ${what}: ${value}`)
	}
	return n
}

function parseInteger(value: string, what: string): number {
	const n = parseNumber(value, what)
	if (!Number.isInteger(n)) {
		throw new Error(`Invalid ${what}: ${value}`)
	}
	return n
}

function parseSize(value: string, what: string): number {
	const n = parseInteger(value, what)
	if (n < 1) {
		throw new Error(`Invalid ${what}: ${value}`)
	}
	return n
}

function parsePositive(value: string, what: string): number {
	const n = parseNumber(value, what)
	if (n <= 0) {
		throw new Error(`Invalid ${what}: ${value}`)
	}
	return n
}

function parseThresholds(value: string): number[] {
	return value.split(',').map((threshold) => parseNumber(threshold, 'threshold'))
}

// Round even sizes up to the next odd one
function toOdd(size: number): number {
	return size % 2 === 0 ? size + 1 : size
}
