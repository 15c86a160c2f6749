/**
 * CRC-32 (IEEE 802.3, reflected polynomial 0xedb88320) lookup table
 */
const CRC_TABLE: Uint32Array = (() => {
	const table = new Uint32Array(256)
	for (let n = 0; n < 256; n++) {
		let c = n
		for (let k = 0; k < 8; k++) {
			c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
		}
		table[n] = c >>> 0
	}
	return table
})()

/**
 * Continue a running CRC over more bytes. Start with 0.
 */
export function updateCrc32(crc: number, data: Uint8Array, start = 0, end = data.length): number {
	let c = (crc ^ 0xffffffff) >>> 0
	for (let i = start; i < end; i++) {
		c = CRC_TABLE[(c ^ data[i]) & 0xff] ^ (c >>> 8)
	}
	return (c ^ 0xffffffff) >>> 0
}

/**
 * Calculate CRC32
 */
export function crc32(data: Uint8Array, start = 0, end = data.length): number {
	return updateCrc32(0, data, start, end)
}
