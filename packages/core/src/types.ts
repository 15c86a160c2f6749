/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255), non-premultiplied, row-major
 */
export interface PixelBuffer {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Single palette entry
 */
export type Rgba = readonly [r: number, g: number, b: number, a: number]

/**
 * Ordered list of up to 256 unique colors
 */
export type Palette = readonly Rgba[]

/**
 * Axis-aligned rectangle
 */
export interface Rect {
	readonly x: number
	readonly y: number
	readonly width: number
	readonly height: number
}

/**
 * Formats the toolkit can sniff
 */
export type Format = 'png' | 'apng' | 'gif' | 'aseprite'

/**
 * Largest palette any supported format can carry
 */
export const MAX_PALETTE_SIZE = 256

/**
 * Create empty (fully transparent) pixel buffer
 */
export function createPixelBuffer(width: number, height: number): PixelBuffer {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Clone pixel buffer
 */
export function clonePixelBuffer(image: PixelBuffer): PixelBuffer {
	return {
		width: image.width,
		height: image.height,
		data: new Uint8Array(image.data),
	}
}

/**
 * Pack RGBA into one unsigned 32-bit key
 */
export function packRgba(r: number, g: number, b: number, a: number): number {
	return ((r << 24) | (g << 16) | (b << 8) | a) >>> 0
}

/**
 * Unpack a key produced by packRgba
 */
export function unpackRgba(key: number): Rgba {
	return [(key >>> 24) & 0xff, (key >>> 16) & 0xff, (key >>> 8) & 0xff, key & 0xff]
}
