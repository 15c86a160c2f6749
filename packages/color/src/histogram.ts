import { type PixelBuffer, packRgba } from '@pixel-codec/core'
import type { ColorCount } from './types'

/**
 * Unique RGBA colors with pixel counts, in order of first appearance
 */
export function buildHistogram(image: PixelBuffer): ColorCount[] {
	const { data } = image
	const counts = new Map<number, number>()
	for (let i = 0; i < data.length; i += 4) {
		const key = packRgba(data[i], data[i + 1], data[i + 2], data[i + 3])
		counts.set(key, (counts.get(key) ?? 0) + 1)
	}

	const colors: ColorCount[] = []
	for (const [key, count] of counts) {
		colors.push({ r: key >>> 24, g: (key >>> 16) & 0xff, b: (key >>> 8) & 0xff, a: key & 0xff, count, key })
	}
	return colors
}

/**
 * Frequency-weighted mean color of a population
 */
export function weightedMean(colors: readonly ColorCount[]): [number, number, number, number] {
	let total = 0
	let r = 0
	let g = 0
	let b = 0
	let a = 0
	for (const color of colors) {
		total += color.count
		r += color.r * color.count
		g += color.g * color.count
		b += color.b * color.count
		a += color.a * color.count
	}
	if (total === 0) return [0, 0, 0, 0]
	return [Math.round(r / total), Math.round(g / total), Math.round(b / total), Math.round(a / total)]
}
