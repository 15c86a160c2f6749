import {
	MAX_PALETTE_SIZE,
	type Palette,
	type PixelBuffer,
	QuantizationError,
	type Rgba,
	assertPixelBuffer,
	packRgba,
	parseOptions,
	unpackRgba,
} from '@pixel-codec/core'
import { z } from 'zod'
import { distanceSchema, remap } from './distance'
import { buildHistogram } from './histogram'
import { kMeans } from './quantizers/k-means'
import { medianCut } from './quantizers/median-cut'
import { octree } from './quantizers/octree'
import { popularity } from './quantizers/popularity'
import type { ColorCount, ExtractPaletteOptions, QuantizeAlgorithm, QuantizeOptions, QuantizeResult } from './types'

type Quantizer = (colors: readonly ColorCount[], maxColors: number) => Rgba[]

const QUANTIZERS: Record<QuantizeAlgorithm, Quantizer> = {
	'median-cut': medianCut,
	octree,
	popularity,
	'k-means': kMeans,
}

const algorithmSchema = z.enum(['median-cut', 'octree', 'popularity', 'k-means'])

const quantizeSchema = z.object({ distance: distanceSchema })

const extractSchema = z
	.object({
		algorithm: algorithmSchema.default('median-cut'),
	})
	.strict()

const TRANSPARENT: Rgba = [0, 0, 0, 0]

function assertColorCount(n: number): void {
	if (!Number.isInteger(n) || n < 1 || n > MAX_PALETTE_SIZE) {
		throw new QuantizationError(`Color count must be an integer in 1..${MAX_PALETTE_SIZE}, got ${n}`, {
			metadata: { colors: n },
		})
	}
}

function dedupe(colors: readonly Rgba[]): Rgba[] {
	const seen = new Set<number>()
	return colors.filter(([r, g, b, a]) => {
		const key = packRgba(r, g, b, a)
		if (seen.has(key)) return false
		seen.add(key)
		return true
	})
}

/**
 * Build a palette of at most `n` colors
 */
function buildPalette(histogram: readonly ColorCount[], n: number, algorithm: QuantizeAlgorithm): Rgba[] {
	if (histogram.length <= n) {
		return histogram.map((color) => unpackRgba(color.key))
	}

	const opaque = histogram.filter((color) => color.a !== 0)
	const reserve = n >= 2 && opaque.length < histogram.length
	const population = reserve ? opaque : histogram
	const slots = reserve ? n - 1 : n

	const representatives =
		population.length <= slots
			? population.map((color) => unpackRgba(color.key))
			: QUANTIZERS[algorithm](population, slots)
	return dedupe(reserve ? [TRANSPARENT, ...representatives] : representatives)
}

/**
 * Reduce an image to at most `n` colors. When the image already has no
 * more than `n` unique colors the palette lists them in order of first
 * appearance and the mapping is exact.
 */
export function quantize(
	image: PixelBuffer,
	n: number,
	algorithm: QuantizeAlgorithm = 'median-cut',
	options: QuantizeOptions = {}
): QuantizeResult {
	assertColorCount(n)
	const { distance } = parseOptions(quantizeSchema, options, 'quantize')
	const method = parseOptions(algorithmSchema, algorithm, 'quantize algorithm')
	assertPixelBuffer(image)

	const palette: Palette = buildPalette(buildHistogram(image), n, method)
	return { palette, indices: remap(image, palette, { distance }) }
}

/**
 * Palette of at most `n` representative colors
 */
export function extractPalette(image: PixelBuffer, n: number, options: ExtractPaletteOptions = {}): Palette {
	assertColorCount(n)
	const { algorithm } = parseOptions(extractSchema, options, 'extract palette')
	assertPixelBuffer(image)
	return buildPalette(buildHistogram(image), n, algorithm)
}
