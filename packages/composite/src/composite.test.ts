import type { PixelBuffer } from '@pixel-codec/core'
import { describe, expect, it } from 'vitest'
import { blendColor, isNonSeparable } from './blend'
import { clearRegion, compositeOver, drawLayer, extractRegion, flattenLayers, replaceRegion } from './composite'
import { BLEND_MODES, type Layer } from './types'

describe('Composite', () => {
	// Helper to create test image
	function createSolidImage(width: number, height: number, r: number, g: number, b: number, a = 255): PixelBuffer {
		const data = new Uint8Array(width * height * 4)
		for (let i = 0; i < width * height; i++) {
			data[i * 4] = r
			data[i * 4 + 1] = g
			data[i * 4 + 2] = b
			data[i * 4 + 3] = a
		}
		return { width, height, data }
	}

	function pixel(image: PixelBuffer, x: number, y: number): number[] {
		const i = (y * image.width + x) * 4
		return Array.from(image.data.subarray(i, i + 4))
	}

	describe('blendColor', () => {
		const rounded = (c: number[]): number[] => c.map(Math.round)

		it('applies separable modes per channel', () => {
			expect(rounded(blendColor('normal', [100, 100, 100], [200, 10, 0]))).toEqual([200, 10, 0])
			expect(rounded(blendColor('multiply', [255, 0, 255], [128, 128, 0]))).toEqual([128, 0, 0])
			expect(rounded(blendColor('screen', [0, 255, 0], [128, 0, 0]))).toEqual([128, 255, 0])
			expect(rounded(blendColor('darken', [100, 100, 100], [200, 50, 100]))).toEqual([100, 50, 100])
			expect(rounded(blendColor('addition', [200, 0, 0], [100, 0, 0]))).toEqual([255, 0, 0])
			expect(rounded(blendColor('subtract', [100, 0, 0], [200, 0, 0]))).toEqual([0, 0, 0])
			expect(rounded(blendColor('difference', [100, 0, 0], [30, 0, 0]))).toEqual([70, 0, 0])
			expect(rounded(blendColor('divide', [100, 0, 51], [0, 0, 255]))).toEqual([255, 0, 51])
		})

		it('identifies non-separable modes', () => {
			expect(isNonSeparable('hue')).toBe(true)
			expect(isNonSeparable('luminosity')).toBe(true)
			expect(isNonSeparable('overlay')).toBe(false)
		})

		it('luminosity of gray onto gray takes the source lightness', () => {
			expect(rounded(blendColor('luminosity', [100, 100, 100], [200, 200, 200]))).toEqual([200, 200, 200])
		})

		it('hue onto a gray backdrop stays gray', () => {
			expect(rounded(blendColor('hue', [128, 128, 128], [255, 0, 0]))).toEqual([128, 128, 128])
		})

		it('lists modes in stored id order', () => {
			expect(BLEND_MODES.indexOf('multiply')).toBe(1)
			expect(BLEND_MODES.indexOf('divide')).toBe(18)
		})
	})

	describe('flattenLayers', () => {
		it('should paint layers bottom first', () => {
			const layers: Layer[] = [
				{ image: createSolidImage(2, 2, 255, 0, 0) },
				{ image: createSolidImage(1, 1, 0, 0, 255), x: 1, y: 1 },
			]
			const result = flattenLayers(layers, 2, 2)
			expect(pixel(result, 0, 0)).toEqual([255, 0, 0, 255])
			expect(pixel(result, 1, 1)).toEqual([0, 0, 255, 255])
		})

		it('should skip hidden layers', () => {
			const layers: Layer[] = [
				{ image: createSolidImage(1, 1, 255, 0, 0) },
				{ image: createSolidImage(1, 1, 0, 255, 0), visible: false },
			]
			expect(pixel(flattenLayers(layers, 1, 1), 0, 0)).toEqual([255, 0, 0, 255])
		})

		it('should honor opacity', () => {
			const layers: Layer[] = [
				{ image: createSolidImage(1, 1, 0, 0, 0) },
				{ image: createSolidImage(1, 1, 255, 255, 255), opacity: 0.5 },
			]
			expect(pixel(flattenLayers(layers, 1, 1), 0, 0)).toEqual([128, 128, 128, 255])
		})

		it('should mix alpha with Porter-Duff over', () => {
			const layers: Layer[] = [{ image: createSolidImage(1, 1, 255, 0, 0, 128) }]
			expect(pixel(flattenLayers(layers, 1, 1), 0, 0)).toEqual([255, 0, 0, 128])
		})

		it('should apply blend modes over an opaque base', () => {
			const layers: Layer[] = [
				{ image: createSolidImage(1, 1, 200, 100, 50) },
				{ image: createSolidImage(1, 1, 100, 200, 50), blendMode: 'darken' },
			]
			expect(pixel(flattenLayers(layers, 1, 1), 0, 0)).toEqual([100, 100, 50, 255])
		})

		it('should clip layers outside the canvas', () => {
			const layers: Layer[] = [{ image: createSolidImage(3, 3, 9, 9, 9), x: -2, y: -2 }]
			const result = flattenLayers(layers, 2, 2)
			expect(pixel(result, 0, 0)).toEqual([9, 9, 9, 255])
			expect(pixel(result, 1, 0)).toEqual([0, 0, 0, 0])
		})
	})

	describe('regions', () => {
		it('compositeOver skips transparent pixels', () => {
			const canvas = createSolidImage(2, 1, 1, 2, 3)
			const overlay: PixelBuffer = { width: 2, height: 1, data: new Uint8Array([0, 0, 0, 0, 7, 8, 9, 255]) }
			compositeOver(canvas, overlay)
			expect(Array.from(canvas.data)).toEqual([1, 2, 3, 255, 7, 8, 9, 255])
		})

		it('replaceRegion copies alpha verbatim', () => {
			const canvas = createSolidImage(3, 1, 1, 2, 3)
			replaceRegion(canvas, createSolidImage(1, 1, 0, 0, 0, 0), 1, 0)
			expect(pixel(canvas, 1, 0)).toEqual([0, 0, 0, 0])
			expect(pixel(canvas, 2, 0)).toEqual([1, 2, 3, 255])
		})

		it('clearRegion resets to transparent', () => {
			const canvas = createSolidImage(2, 2, 5, 5, 5)
			clearRegion(canvas, { x: 1, y: 0, width: 5, height: 1 })
			expect(pixel(canvas, 0, 0)).toEqual([5, 5, 5, 255])
			expect(pixel(canvas, 1, 0)).toEqual([0, 0, 0, 0])
			expect(pixel(canvas, 1, 1)).toEqual([5, 5, 5, 255])
		})

		it('extractRegion copies a sub-rectangle', () => {
			const canvas: PixelBuffer = { width: 2, height: 2, data: Uint8Array.from({ length: 16 }, (_, i) => i) }
			const region = extractRegion(canvas, { x: 1, y: 1, width: 1, height: 1 })
			expect(Array.from(region.data)).toEqual([12, 13, 14, 15])
		})

		it('drawLayer paints in place', () => {
			const canvas = createSolidImage(1, 1, 0, 0, 0, 0)
			drawLayer(canvas, { image: createSolidImage(1, 1, 4, 5, 6) })
			expect(pixel(canvas, 0, 0)).toEqual([4, 5, 6, 255])
		})
	})
})
