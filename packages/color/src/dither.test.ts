import { InvalidInputError, type Palette, type PixelBuffer } from '@pixel-codec/core'
import { describe, expect, it } from 'vitest'
import { remap } from './distance'
import { dither } from './dither'

const BW: Palette = [
	[0, 0, 0, 255],
	[255, 255, 255, 255],
]

function gray(width: number, height: number, value: number, alpha = 255): PixelBuffer {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < width * height; i++) data.set([value, value, value, alpha], i * 4)
	return { width, height, data }
}

describe('dither', () => {
	it('should diffuse error to the right along a row', () => {
		expect(Array.from(dither(gray(4, 1, 128), BW))).toEqual([1, 0, 1, 0])
	})

	it('should diffuse error into the next row', () => {
		// The first pixel goes white, pushing -127 * 5/16 onto the pixel below
		const indices = dither(gray(1, 2, 128), BW)
		expect(Array.from(indices)).toEqual([1, 0])
	})

	it('should add the Bayer threshold in ordered mode', () => {
		const indices = dither(gray(2, 2, 128), BW, 'ordered', { matrixSize: 2 })
		expect(Array.from(indices)).toEqual([0, 1, 1, 0])
	})

	it('should tile the threshold matrix', () => {
		const indices = dither(gray(4, 1, 128), BW, 'ordered', { matrixSize: 2 })
		expect(Array.from(indices)).toEqual([0, 1, 0, 1])
	})

	it('should match remap without dithering', () => {
		const image = gray(3, 3, 90)
		expect(dither(image, BW, 'none')).toEqual(remap(image, BW))
	})

	it('should be deterministic', () => {
		const data = new Uint8Array(8 * 8 * 4)
		for (let i = 0; i < 64; i++) data.set([i * 4, 255 - i * 3, (i * 29) & 0xff, 255], i * 4)
		const image: PixelBuffer = { width: 8, height: 8, data }
		const palette: Palette = [
			[0, 0, 0, 255],
			[255, 0, 0, 255],
			[0, 255, 0, 255],
			[0, 0, 255, 255],
		]
		for (const serpentine of [false, true]) {
			expect(dither(image, palette, 'floyd-steinberg', { serpentine })).toEqual(
				dither(image, palette, 'floyd-steinberg', { serpentine })
			)
		}
		expect(dither(image, palette, 'ordered', { matrixSize: 8 })).toEqual(
			dither(image, palette, 'ordered', { matrixSize: 8 })
		)
	})

	it('should send translucent pixels to the transparent entry', () => {
		const palette: Palette = [...BW, [0, 0, 0, 0]]
		expect(Array.from(dither(gray(2, 1, 200, 100), palette))).toEqual([2, 2])
		expect(Array.from(dither(gray(2, 1, 200, 100), palette, 'ordered'))).toEqual([2, 2])
		expect(Array.from(dither(gray(2, 1, 200, 100), palette, 'floyd-steinberg', { alphaThreshold: 50 }))).toEqual([
			1, 1,
		])
	})

	it('should validate options', () => {
		expect(() => dither(gray(1, 1, 0), BW, 'ordered', { spread: -1 })).toThrow(InvalidInputError)
		expect(() => dither(gray(1, 1, 0), [])).toThrow(InvalidInputError)
	})
})
