const MOD = 65521
// Largest n such that 255n(n+1)/2 + (n+1)(MOD-1) fits in 32 bits
const NMAX = 5552

/**
 * Adler-32 checksum
 */
export function adler32(data: Uint8Array, start = 0, end = data.length): number {
	let a = 1
	let b = 0
	let i = start
	while (i < end) {
		const stop = Math.min(i + NMAX, end)
		for (; i < stop; i++) {
			a += data[i]
			b += a
		}
		a %= MOD
		b %= MOD
	}
	return ((b << 16) | a) >>> 0
}
