import type { Palette, PixelBuffer } from '@pixel-codec/core'
import { describe, expect, it } from 'vitest'
import { labToRgb, rgbToLab, rgbToXyz, xyzToLab } from './convert'
import { nearestColor, remap } from './distance'
import { buildHistogram } from './histogram'

function pixels(colors: [number, number, number, number][]): PixelBuffer {
	return { width: colors.length, height: 1, data: Uint8Array.from(colors.flat()) }
}

describe('Color', () => {
	describe('conversion', () => {
		it('should map white to the D65 white point', () => {
			const [x, y, z] = rgbToXyz(255, 255, 255)
			expect(x).toBeCloseTo(0.9505, 3)
			expect(y).toBeCloseTo(1, 3)
			expect(z).toBeCloseTo(1.089, 3)

			const [l, a, b] = rgbToLab(255, 255, 255)
			expect(l).toBeCloseTo(100, 1)
			expect(a).toBeCloseTo(0, 1)
			expect(b).toBeCloseTo(0, 1)
		})

		it('should map black to zero lightness', () => {
			const [l, a, b] = xyzToLab(0, 0, 0)
			expect(l).toBeCloseTo(0, 5)
			expect(a).toBeCloseTo(0, 5)
			expect(b).toBeCloseTo(0, 5)
		})

		it('should convert pure red', () => {
			const [l, a, b] = rgbToLab(255, 0, 0)
			expect(l).toBeCloseTo(53.24, 1)
			expect(a).toBeCloseTo(80.09, 0)
			expect(b).toBeCloseTo(67.2, 0)
		})

		it('should round trip through Lab', () => {
			expect(labToRgb(...rgbToLab(200, 100, 50))).toEqual([200, 100, 50])
			expect(labToRgb(...rgbToLab(12, 34, 56))).toEqual([12, 34, 56])
		})
	})

	describe('histogram', () => {
		it('should count colors in order of first appearance', () => {
			const histogram = buildHistogram(
				pixels([
					[0, 0, 255, 255],
					[255, 0, 0, 255],
					[0, 0, 255, 255],
				])
			)
			expect(histogram.map(({ r, g, b, a, count }) => [r, g, b, a, count])).toEqual([
				[0, 0, 255, 255, 2],
				[255, 0, 0, 255, 1],
			])
		})
	})

	describe('nearest color', () => {
		const palette: Palette = [
			[0, 0, 0, 255],
			[255, 255, 255, 255],
		]

		it('should use squared RGB distance by default', () => {
			expect(nearestColor(palette, 125, 125, 125, 255)).toBe(0)
			expect(nearestColor(palette, 130, 130, 130, 255)).toBe(1)
		})

		it('should use perceptual distance when asked', () => {
			// L* of sRGB 125 gray is about 52, closer to white
			expect(nearestColor(palette, 125, 125, 125, 255, 'lab')).toBe(1)
		})

		it('should keep transparent pixels on the transparent entry', () => {
			const withClear: Palette = [[255, 255, 255, 255], [0, 0, 0, 0]]
			const indices = remap(
				pixels([
					[250, 250, 250, 0],
					[250, 250, 250, 255],
				]),
				withClear
			)
			expect(Array.from(indices)).toEqual([1, 0])
		})
	})
})
