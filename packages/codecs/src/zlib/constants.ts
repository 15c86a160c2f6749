/**
 * Base lengths for length symbols 257..285
 */
export const LENGTH_BASE: readonly number[] = Object.freeze([
	3, 4, 5, 6, 7, 8, 9, 10, 11, 13, 15, 17, 19, 23, 27, 31, 35, 43, 51, 59, 67, 83, 99, 115, 131, 163, 195,
	227, 258,
])

/**
 * Extra bits for length symbols 257..285
 */
export const LENGTH_EXTRA: readonly number[] = Object.freeze([
	0, 0, 0, 0, 0, 0, 0, 0, 1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3, 4, 4, 4, 4, 5, 5, 5, 5, 0,
])

/**
 * Base distances for distance symbols 0..29
 */
export const DIST_BASE: readonly number[] = Object.freeze([
	1, 2, 3, 4, 5, 7, 9, 13, 17, 25, 33, 49, 65, 97, 129, 193, 257, 385, 513, 769, 1025, 1537, 2049, 3073,
	4097, 6145, 8193, 12289, 16385, 24577,
])

/**
 * Extra bits for distance symbols 0..29
 */
export const DIST_EXTRA: readonly number[] = Object.freeze([
	0, 0, 0, 0, 1, 1, 2, 2, 3, 3, 4, 4, 5, 5, 6, 6, 7, 7, 8, 8, 9, 9, 10, 10, 11, 11, 12, 12, 13, 13,
])

/**
 * Order of code length code lengths in a dynamic block header
 */
export const CL_ORDER: readonly number[] = Object.freeze([
	16, 17, 18, 0, 8, 7, 9, 6, 10, 5, 11, 4, 12, 3, 13, 2, 14, 1, 15,
])

export const END_OF_BLOCK = 256
export const LITLEN_SYMBOLS = 286
export const DIST_SYMBOLS = 30
export const CL_SYMBOLS = 19
export const MAX_CODE_BITS = 15
export const MAX_CL_BITS = 7
export const WINDOW_SIZE = 32768
export const MIN_MATCH = 3
export const MAX_MATCH = 258
export const MAX_STORED = 65535

/**
 * Block type field values
 */
export const BlockType = {
	Stored: 0,
	Fixed: 1,
	Dynamic: 2,
} as const

export type BlockType = (typeof BlockType)[keyof typeof BlockType]

/**
 * Code lengths of the fixed literal/length table (288 symbols)
 */
export const FIXED_LITLEN_LENGTHS: readonly number[] = Object.freeze(
	Array.from({ length: 288 }, (_, i) => (i < 144 ? 8 : i < 256 ? 9 : i < 280 ? 7 : 8))
)

/**
 * Code lengths of the fixed distance table (32 symbols, 30 and 31 unused)
 */
export const FIXED_DIST_LENGTHS: readonly number[] = Object.freeze(new Array<number>(32).fill(5))

/**
 * Length (3..258) to length symbol index (0..28)
 */
export const LENGTH_SYMBOL: readonly number[] = Object.freeze(
	(() => {
		const table = new Array<number>(MAX_MATCH + 1).fill(0)
		for (let s = 0; s < 28; s++) {
			for (let e = 0; e < 1 << LENGTH_EXTRA[s]; e++) {
				const length = LENGTH_BASE[s] + e
				if (length < MAX_MATCH) table[length] = s
			}
		}
		table[MAX_MATCH] = 28
		return table
	})()
)

/**
 * Distance (1..32768) to distance symbol index (0..29)
 */
export function distanceSymbol(distance: number): number {
	let s = DIST_SYMBOLS - 1
	while (DIST_BASE[s] > distance) s--
	return s
}
