import { Image } from '@pixelflow/core'
import sharp from 'sharp'

/**
 * Decode any format sharp reads into an RGBA image
 */
export async function loadImage(path: string): Promise<Image> {
	const { data, info } = await sharp(path).ensureAlpha().raw().toBuffer({ resolveWithObject: true })
	return Image.fromImageData({ width: info.width, height: info.height, data })
}

/**
 * Encode an image; the format follows the file extension
 */
export async function saveImage(image: Image, path: string): Promise<void> {
	await sharp(Buffer.from(image.toRgba8()), {
		raw: { width: image.width, height: image.height, channels: 4 },
	}).toFile(path)
}
