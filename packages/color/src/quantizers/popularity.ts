import { type Rgba, unpackRgba } from '@pixel-codec/core'
import type { ColorCount } from '../types'

/**
 * The most frequent colors; equal counts order by color value
 */
export function popularity(colors: readonly ColorCount[], maxColors: number): Rgba[] {
	return [...colors]
		.sort((a, b) => b.count - a.count || a.key - b.key)
		.slice(0, maxColors)
		.map((color) => unpackRgba(color.key))
}
