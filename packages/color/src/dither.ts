import { type Palette, type PixelBuffer, assertPalette, assertPixelBuffer, parseOptions } from '@pixel-codec/core'
import { z } from 'zod'
import { createMatcher, distanceSchema, remap, transparentIndex } from './distance'
import type { DitherMethod, DitherOptions } from './types'

const optionsSchema = z.object({
	serpentine: z.boolean().default(false),
	matrixSize: z.union([z.literal(2), z.literal(4), z.literal(8)]).default(4),
	spread: z.number().min(0).max(255).default(64),
	alphaThreshold: z.number().int().min(0).max(256).default(128),
	distance: distanceSchema,
})

const methodSchema = z.enum(['floyd-steinberg', 'ordered', 'none'])

type ResolvedOptions = z.output<typeof optionsSchema>

/**
 * Bayer threshold matrix of size 2^k, built by recursive doubling
 */
function bayerMatrix(size: number): readonly number[] {
	let matrix = [0]
	for (let n = 1; n < size; n *= 2) {
		const next = new Array<number>(4 * n * n)
		for (let y = 0; y < n; y++) {
			for (let x = 0; x < n; x++) {
				const t = 4 * matrix[y * n + x]
				next[y * 2 * n + x] = t
				next[y * 2 * n + x + n] = t + 2
				next[(y + n) * 2 * n + x] = t + 3
				next[(y + n) * 2 * n + x + n] = t + 1
			}
		}
		matrix = next
	}
	return Object.freeze(matrix)
}

const BAYER: Readonly<Record<2 | 4 | 8, readonly number[]>> = Object.freeze({
	2: bayerMatrix(2),
	4: bayerMatrix(4),
	8: bayerMatrix(8),
})

function clamp(value: number): number {
	return value < 0 ? 0 : value > 255 ? 255 : value
}

function floydSteinberg(image: PixelBuffer, palette: Palette, options: ResolvedOptions): Uint8Array {
	const { width, height, data } = image
	const match = createMatcher(palette, options.distance)
	const transparent = transparentIndex(palette)
	const indices = new Uint8Array(width * height)

	// Working RGB values that accumulate diffused error
	const work = new Float32Array(width * height * 3)
	for (let i = 0; i < width * height; i++) {
		work[i * 3] = data[i * 4]
		work[i * 3 + 1] = data[i * 4 + 1]
		work[i * 3 + 2] = data[i * 4 + 2]
	}

	const spread = (x: number, y: number, er: number, eg: number, eb: number, weight: number): void => {
		if (x < 0 || x >= width || y >= height) return
		const w = (y * width + x) * 3
		work[w] += er * weight
		work[w + 1] += eg * weight
		work[w + 2] += eb * weight
	}

	for (let y = 0; y < height; y++) {
		const reverse = options.serpentine && y % 2 === 1
		const dir = reverse ? -1 : 1
		for (let step = 0; step < width; step++) {
			const x = reverse ? width - 1 - step : step
			const i = y * width + x
			const alpha = data[i * 4 + 3]

			if (alpha < options.alphaThreshold) {
				indices[i] =
					transparent >= 0 ? transparent : match(data[i * 4], data[i * 4 + 1], data[i * 4 + 2], alpha)
				continue
			}

			const r = clamp(work[i * 3])
			const g = clamp(work[i * 3 + 1])
			const b = clamp(work[i * 3 + 2])
			const index = match(Math.round(r), Math.round(g), Math.round(b), alpha)
			indices[i] = index

			const [pr, pg, pb] = palette[index]
			const er = r - pr
			const eg = g - pg
			const eb = b - pb
			spread(x + dir, y, er, eg, eb, 7 / 16)
			spread(x - dir, y + 1, er, eg, eb, 3 / 16)
			spread(x, y + 1, er, eg, eb, 5 / 16)
			spread(x + dir, y + 1, er, eg, eb, 1 / 16)
		}
	}
	return indices
}

function ordered(image: PixelBuffer, palette: Palette, options: ResolvedOptions): Uint8Array {
	const { width, height, data } = image
	const size = options.matrixSize
	const matrix = BAYER[size]
	const match = createMatcher(palette, options.distance)
	const transparent = transparentIndex(palette)
	const indices = new Uint8Array(width * height)

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const i = y * width + x
			const o = i * 4
			const alpha = data[o + 3]
			if (alpha < options.alphaThreshold && transparent >= 0) {
				indices[i] = transparent
				continue
			}

			const offset = ((matrix[(y % size) * size + (x % size)] + 0.5) / (size * size) - 0.5) * options.spread
			indices[i] = match(
				Math.round(clamp(data[o] + offset)),
				Math.round(clamp(data[o + 1] + offset)),
				Math.round(clamp(data[o + 2] + offset)),
				alpha
			)
		}
	}
	return indices
}

/**
 * Map an image onto a palette, one index per pixel. Output depends only
 * on the arguments.
 */
export function dither(
	image: PixelBuffer,
	palette: Palette,
	method: DitherMethod = 'floyd-steinberg',
	options: DitherOptions = {}
): Uint8Array {
	const resolved = parseOptions(optionsSchema, options, 'dither')
	const kind = parseOptions(methodSchema, method, 'dither method')
	assertPixelBuffer(image)
	assertPalette(palette)

	switch (kind) {
		case 'floyd-steinberg':
			return floydSteinberg(image, palette, resolved)
		case 'ordered':
			return ordered(image, palette, resolved)
		case 'none':
			return remap(image, palette, { distance: resolved.distance })
	}
}
