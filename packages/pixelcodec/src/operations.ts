import {
	type ApngAnimation,
	type ApngEncodeOptions,
	type AsepriteSprite,
	type DecodedApng,
	type DecodedGif,
	type GifEncodeOptions,
	type GifFrameInput,
	type PngEncodeOptions,
	decodeApng,
	decodeAseprite,
	decodeGif,
	decodePng,
	deflate,
	encodeApng,
	encodeGif,
	encodePng,
	inflate,
} from '@pixel-codec/codecs'
import { CorruptStreamError, type PixelBuffer, UnsupportedFormatError, detectFormat } from '@pixel-codec/core'

/**
 * zlib-wrapped deflate, level 0-9
 */
export function compress(data: Uint8Array, level = 6): Uint8Array {
	return deflate(data, level)
}

export function decompress(data: Uint8Array): Uint8Array {
	return inflate(data)
}

export function encodeRaster(image: PixelBuffer, options: PngEncodeOptions = {}): Uint8Array {
	return encodePng(image, options)
}

export function decodeRaster(data: Uint8Array): PixelBuffer {
	return decodePng(data)
}

export function encodeAnimatedRaster(animation: ApngAnimation, options: ApngEncodeOptions = {}): Uint8Array {
	return encodeApng(animation, options)
}

export function decodeAnimatedRaster(data: Uint8Array): DecodedApng {
	return decodeApng(data)
}

export function encodeIndexedAnimation(frames: readonly GifFrameInput[], options: GifEncodeOptions = {}): Uint8Array {
	return encodeGif(frames, options)
}

export function decodeIndexedAnimation(data: Uint8Array): DecodedGif {
	return decodeGif(data)
}

export function decodeLayeredSpriteFile(data: Uint8Array): AsepriteSprite {
	return decodeAseprite(data)
}

/**
 * Decode any supported file to its first frame
 */
export function decodeImage(data: Uint8Array): PixelBuffer {
	const format = detectFormat(data)
	switch (format) {
		case 'png':
		case 'apng':
			return decodePng(data)
		case 'gif': {
			const [first] = decodeGif(data).frames
			if (!first) throw new CorruptStreamError('GIF has no frames')
			return first.image
		}
		case 'aseprite': {
			const sprite = decodeAseprite(data)
			if (sprite.frames.length === 0) throw new CorruptStreamError('Aseprite file has no frames')
			return sprite.getFrame(0)
		}
		case null:
			throw new UnsupportedFormatError('Unrecognized image format')
	}
}
