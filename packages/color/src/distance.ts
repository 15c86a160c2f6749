import { type Palette, type PixelBuffer, assertPalette, assertPixelBuffer, packRgba, parseOptions } from '@pixel-codec/core'
import { z } from 'zod'
import { rgbToLab } from './convert'
import type { DistanceMetric, Lab, RemapOptions } from './types'

/** Lab units per alpha step, so full transparency weighs like L* 0 to 100 */
const LAB_ALPHA_SCALE = 100 / 255

/**
 * Squared RGBA distance
 */
export function rgbDistance(
	r1: number,
	g1: number,
	b1: number,
	a1: number,
	r2: number,
	g2: number,
	b2: number,
	a2: number
): number {
	return (r1 - r2) ** 2 + (g1 - g2) ** 2 + (b1 - b2) ** 2 + (a1 - a2) ** 2
}

/**
 * Squared CIE76 difference plus a scaled alpha term
 */
export function labDistance(lab1: Lab, a1: number, lab2: Lab, a2: number): number {
	return (
		(lab1[0] - lab2[0]) ** 2 +
		(lab1[1] - lab2[1]) ** 2 +
		(lab1[2] - lab2[2]) ** 2 +
		((a1 - a2) * LAB_ALPHA_SCALE) ** 2
	)
}

/** Finds the palette index nearest to a color */
export type ColorMatcher = (r: number, g: number, b: number, a: number) => number

/**
 * Nearest-color lookup over a palette, caching results for the life of the matcher
 */
export function createMatcher(palette: Palette, metric: DistanceMetric = 'rgb'): ColorMatcher {
	const cache = new Map<number, number>()
	const labs = metric === 'lab' ? palette.map(([r, g, b]) => rgbToLab(r, g, b)) : []

	const search = (r: number, g: number, b: number, a: number): number => {
		let best = 0
		let bestDistance = Number.POSITIVE_INFINITY
		const lab = metric === 'lab' ? rgbToLab(r, g, b) : undefined
		for (let i = 0; i < palette.length; i++) {
			const [pr, pg, pb, pa] = palette[i]
			const d = lab ? labDistance(lab, a, labs[i], pa) : rgbDistance(r, g, b, a, pr, pg, pb, pa)
			if (d < bestDistance) {
				bestDistance = d
				best = i
				if (d === 0) break
			}
		}
		return best
	}

	return (r, g, b, a) => {
		const key = packRgba(r, g, b, a)
		let index = cache.get(key)
		if (index === undefined) {
			index = search(r, g, b, a)
			cache.set(key, index)
		}
		return index
	}
}

/**
 * Index of the palette entry nearest to a color; the first wins ties
 */
export function nearestColor(
	palette: Palette,
	r: number,
	g: number,
	b: number,
	a: number,
	distance: DistanceMetric = 'rgb'
): number {
	assertPalette(palette)
	return createMatcher(palette, distance)(r, g, b, a)
}

/**
 * First fully transparent palette entry, or -1
 */
export function transparentIndex(palette: Palette): number {
	return palette.findIndex(([, , , a]) => a === 0)
}

export const distanceSchema = z.enum(['rgb', 'lab']).default('rgb')

const remapSchema = z.object({ distance: distanceSchema })

/**
 * Map every pixel to its nearest palette entry. A fully transparent pixel
 * never lands on an opaque entry while the palette has a transparent one.
 */
export function remap(image: PixelBuffer, palette: Palette, options: RemapOptions = {}): Uint8Array {
	const { distance } = parseOptions(remapSchema, options, 'remap')
	assertPixelBuffer(image)
	assertPalette(palette)

	const match = createMatcher(palette, distance)
	const transparent = transparentIndex(palette)
	const { data } = image
	const indices = new Uint8Array(image.width * image.height)
	for (let i = 0; i < indices.length; i++) {
		const o = i * 4
		const index = match(data[o], data[o + 1], data[o + 2], data[o + 3])
		indices[i] = data[o + 3] === 0 && transparent >= 0 && palette[index][3] !== 0 ? transparent : index
	}
	return indices
}
