/**
 * Floating-point RGBA pixel
 *
 * Channels are linear floats, nominally in [0, 1]. Intermediate results
 * (noise, convolution sums) may leave that range; they are clamped only when
 * converted back to bytes.
 */
export class Rgba {
	static readonly BLACK = new Rgba(0, 0, 0, 1)
	static readonly WHITE = new Rgba(1, 1, 1, 1)
	static readonly RED = new Rgba(1, 0, 0, 1)
	static readonly GREEN = new Rgba(0, 1, 0, 1)
	static readonly BLUE = new Rgba(0, 0, 1, 1)
	static readonly CYAN = new Rgba(0, 1, 1, 1)
	static readonly VIOLET = new Rgba(1, 0, 1, 1)
	static readonly YELLOW = new Rgba(1, 1, 0, 1)

	static readonly COLOURS: readonly Rgba[] = [
		Rgba.BLACK,
		Rgba.RED,
		Rgba.VIOLET,
		Rgba.BLUE,
		Rgba.CYAN,
		Rgba.GREEN,
		Rgba.YELLOW,
	]

	/** Luminance weights, alpha untouched */
	static readonly GRAYSCALE_FACTOR = new Rgba(0.3, 0.59, 0.11, 1)

	constructor(
		readonly r: number,
		readonly g: number,
		readonly b: number,
		readonly a: number
	) {}

	/**
	 * Opaque gray pixel
	 */
	static gray(value: number): Rgba {
		return new Rgba(value, value, value, 1)
	}

	/**
	 * Build a pixel from four bytes (each divided by 256)
	 */
	static fromBytes(r: number, g: number, b: number, a: number): Rgba {
		return new Rgba(r / 256, g / 256, b / 256, a / 256)
	}

	add(other: Rgba): Rgba {
		return new Rgba(this.r + other.r, this.g + other.g, this.b + other.b, this.a + other.a)
	}

	sub(other: Rgba): Rgba {
		return new Rgba(this.r - other.r, this.g - other.g, this.b - other.b, this.a - other.a)
	}

	mul(other: Rgba): Rgba {
		return new Rgba(this.r * other.r, this.g * other.g, this.b * other.b, this.a * other.a)
	}

	div(scalar: number): Rgba {
		return new Rgba(this.r / scalar, this.g / scalar, this.b / scalar, this.a / scalar)
	}

	min(other: Rgba): Rgba {
		return new Rgba(
			Math.min(this.r, other.r),
			Math.min(this.g, other.g),
			Math.min(this.b, other.b),
			Math.min(this.a, other.a)
		)
	}

	max(other: Rgba): Rgba {
		return new Rgba(
			Math.max(this.r, other.r),
			Math.max(this.g, other.g),
			Math.max(this.b, other.b),
			Math.max(this.a, other.a)
		)
	}

	map(fn: (channel: number) => number): Rgba {
		return new Rgba(fn(this.r), fn(this.g), fn(this.b), fn(this.a))
	}

	withAlpha(alpha: number): Rgba {
		return new Rgba(this.r, this.g, this.b, alpha)
	}

	/**
	 * Weight by GRAYSCALE_FACTOR, then replace r, g and b by their mean
	 */
	grayscale(): Rgba {
		const { r, g, b, a } = this.mul(Rgba.GRAYSCALE_FACTOR)
		return Rgba.gray((r + g + b) / 3).withAlpha(a)
	}

	/**
	 * Lexicographic order over r, b, g, a (blue before green)
	 */
	lessThan(other: Rgba): boolean {
		const lhs = [this.r, this.b, this.g, this.a]
		const rhs = [other.r, other.b, other.g, other.a]
		for (let i = 0; i < 4; i++) {
			if (lhs[i] < rhs[i]) return true
			if (lhs[i] > rhs[i]) return false
		}
		return false
	}

	equals(other: Rgba): boolean {
		return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a
	}

	toArray(): [number, number, number, number] {
		return [this.r, this.g, this.b, this.a]
	}

	/**
	 * Clamp to [0, 1] and scale by 256, saturating at 255
	 */
	toBytes(): [number, number, number, number] {
		return [toByte(this.r), toByte(this.g), toByte(this.b), toByte(this.a)]
	}
}

function toByte(channel: number): number {
	const clamped = Math.max(0, Math.min(1, channel))
	return Math.min(255, Math.trunc(clamped * 256))
}
