import type { Format } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES = {
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	gif: { bytes: [0x47, 0x49, 0x46, 0x38] }, // "GIF8"
	aseprite: { bytes: [0xe0, 0xa5], offset: 4 }, // magic word 0xA5E0, little endian
} as const

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { readonly bytes: readonly number[]; readonly offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Whether a PNG stream declares an animation control chunk before its first image data
 */
function hasAnimationControl(data: Uint8Array): boolean {
	let offset = 8
	while (offset + 8 <= data.length) {
		const length = ((data[offset] << 24) | (data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3]) >>> 0
		const type = String.fromCharCode(data[offset + 4], data[offset + 5], data[offset + 6], data[offset + 7])
		if (type === 'acTL') return true
		if (type === 'IDAT' || type === 'IEND') return false
		offset += 12 + length
	}
	return false
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): Format | null {
	if (matchMagic(data, MAGIC_BYTES.png)) return hasAnimationControl(data) ? 'apng' : 'png'
	if (matchMagic(data, MAGIC_BYTES.gif)) return 'gif'
	if (data.length >= 128 && matchMagic(data, MAGIC_BYTES.aseprite)) return 'aseprite'
	return null
}

