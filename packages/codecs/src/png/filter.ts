import { CorruptStreamError } from '@pixel-codec/core'
import { FilterType } from './types'

const FILTERS: readonly FilterType[] = [
	FilterType.None,
	FilterType.Sub,
	FilterType.Up,
	FilterType.Average,
	FilterType.Paeth,
]

/**
 * Paeth predictor
 */
export function paethPredictor(a: number, b: number, c: number): number {
	const p = a + b - c
	const pa = Math.abs(p - a)
	const pb = Math.abs(p - b)
	const pc = Math.abs(p - c)
	if (pa <= pb && pa <= pc) return a
	if (pb <= pc) return b
	return c
}

/**
 * Apply filter to scanline and return filtered data with filter byte
 */
export function filterScanline(
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number,
	filterType: FilterType
): Uint8Array {
	const len = current.length
	const filtered = new Uint8Array(len + 1)
	filtered[0] = filterType

	for (let i = 0; i < len; i++) {
		const a = i >= bpp ? current[i - bpp] : 0
		const b = previous ? previous[i] : 0
		const c = i >= bpp && previous ? previous[i - bpp] : 0
		let predicted = 0
		switch (filterType) {
			case FilterType.Sub:
				predicted = a
				break
			case FilterType.Up:
				predicted = b
				break
			case FilterType.Average:
				predicted = (a + b) >> 1
				break
			case FilterType.Paeth:
				predicted = paethPredictor(a, b, c)
				break
		}
		filtered[i + 1] = (current[i] - predicted) & 0xff
	}

	return filtered
}

/**
 * Sum of filtered bytes read as signed values (filter byte excluded)
 */
function sumAbsolute(filtered: Uint8Array): number {
	let sum = 0
	for (let i = 1; i < filtered.length; i++) {
		const v = filtered[i]
		sum += v < 128 ? v : 256 - v
	}
	return sum
}

/**
 * Filter a scanline with whichever filter minimises the sum of absolute
 * signed residuals; ties keep the lower filter type
 */
export function selectFilter(current: Uint8Array, previous: Uint8Array | null, bpp: number): Uint8Array {
	let best = filterScanline(current, previous, bpp, FilterType.None)
	let bestSum = sumAbsolute(best)

	for (const filterType of FILTERS.slice(1)) {
		const filtered = filterScanline(current, previous, bpp, filterType)
		const sum = sumAbsolute(filtered)
		if (sum < bestSum) {
			bestSum = sum
			best = filtered
		}
	}

	return best
}

/**
 * Reverse a filter in place
 */
export function unfilterScanline(
	filter: number,
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number
): void {
	const len = current.length

	switch (filter) {
		case FilterType.None:
			break

		case FilterType.Sub:
			for (let i = bpp; i < len; i++) {
				current[i] = (current[i] + current[i - bpp]) & 0xff
			}
			break

		case FilterType.Up:
			if (previous) {
				for (let i = 0; i < len; i++) {
					current[i] = (current[i] + previous[i]) & 0xff
				}
			}
			break

		case FilterType.Average:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp] : 0
				const b = previous ? previous[i] : 0
				current[i] = (current[i] + ((a + b) >> 1)) & 0xff
			}
			break

		case FilterType.Paeth:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp] : 0
				const b = previous ? previous[i] : 0
				const c = i >= bpp && previous ? previous[i - bpp] : 0
				current[i] = (current[i] + paethPredictor(a, b, c)) & 0xff
			}
			break

		default:
			throw new CorruptStreamError(`Unknown filter type: ${filter}`)
	}
}

/**
 * Filter packed rows (rowBytes each) into the byte stream that gets compressed
 */
export function filterRows(raw: Uint8Array, rowBytes: number, height: number, bpp: number): Uint8Array {
	const out = new Uint8Array((rowBytes + 1) * height)
	let previous: Uint8Array | null = null
	for (let y = 0; y < height; y++) {
		const row = raw.subarray(y * rowBytes, (y + 1) * rowBytes)
		out.set(selectFilter(row, previous, bpp), y * (rowBytes + 1))
		previous = row
	}
	return out
}

/**
 * Undo per-row filters; `filtered` holds a filter byte before each row
 */
export function unfilterRows(filtered: Uint8Array, rowBytes: number, height: number, bpp: number): Uint8Array {
	const expected = (rowBytes + 1) * height
	if (filtered.length < expected) {
		throw new CorruptStreamError(`Image data too short: ${filtered.length} < ${expected}`)
	}

	const raw = new Uint8Array(rowBytes * height)
	let previous: Uint8Array | null = null
	for (let y = 0; y < height; y++) {
		const start = y * (rowBytes + 1)
		const row = raw.subarray(y * rowBytes, (y + 1) * rowBytes)
		row.set(filtered.subarray(start + 1, start + 1 + rowBytes))
		unfilterScanline(filtered[start], row, previous, bpp)
		previous = row
	}
	return raw
}
