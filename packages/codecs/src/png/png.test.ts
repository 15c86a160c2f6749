import { CorruptStreamError, InvalidInputError, type PixelBuffer, UnsupportedFormatError } from '@pixel-codec/core'
import { describe, expect, test } from 'vitest'
import { deflate } from '../zlib'
import { readChunks, writeChunks } from './chunks'
import { decodePng, readPngHeader } from './decoder'
import { encodePng, indexBitDepth } from './encoder'
import { filterScanline, paethPredictor, selectFilter, unfilterScanline } from './filter'
import { headerChunk } from './records'
import { ColorType, FilterType, PNG_SIGNATURE } from './types'

function checkerboard(size: number): PixelBuffer {
	const data = new Uint8Array(size * size * 4)
	for (let y = 0; y < size; y++) {
		for (let x = 0; x < size; x++) {
			const o = (y * size + x) * 4
			const on = (x + y) % 2 === 0
			data.set(on ? [0, 0, 0, 255] : [255, 255, 255, 255], o)
		}
	}
	return { width: size, height: size, data }
}

function gradient(width: number, height: number): PixelBuffer {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < width * height; i++) {
		data.set([(i * 7) & 0xff, (i * 13) & 0xff, (i * 29) & 0xff, 255 - (i & 0x7f)], i * 4)
	}
	return { width, height, data }
}

/**
 * Build a PNG from raw unfiltered rows (filter byte 0 on every row)
 */
function rawPng(width: number, height: number, colorType: ColorType, bitDepth: number, rows: number[][], extra: { type: string; data: Uint8Array }[] = []): Uint8Array {
	const body: number[] = []
	for (const row of rows) body.push(0, ...row)
	return writeChunks([
		headerChunk(width, height, colorType, bitDepth),
		...extra,
		{ type: 'IDAT', data: deflate(new Uint8Array(body)) },
		{ type: 'IEND', data: new Uint8Array(0) },
	])
}

describe('PNG', () => {
	describe('encode/decode', () => {
		test('checkerboard round trips exactly', () => {
			const image = checkerboard(4)
			const png = encodePng(image)
			expect(Array.from(png.subarray(0, 8))).toEqual(Array.from(PNG_SIGNATURE))
			const decoded = decodePng(png)
			expect(decoded.width).toBe(4)
			expect(decoded.height).toBe(4)
			expect(decoded.data).toEqual(image.data)
		})

		test('gradient with alpha round trips at every level', () => {
			const image = gradient(17, 9)
			for (const level of [0, 1, 6, 9]) {
				expect(decodePng(encodePng(image, { level })).data).toEqual(image.data)
			}
		})

		test('writes IHDR, IDAT and IEND in order', () => {
			const types = [...readChunks(encodePng(checkerboard(2)))].map((c) => c.type)
			expect(types).toEqual(['IHDR', 'IDAT', 'IEND'])
		})

		test('readPngHeader reports the layout', () => {
			expect(readPngHeader(encodePng(gradient(3, 5)))).toEqual({
				width: 3,
				height: 5,
				bitDepth: 8,
				colorType: ColorType.RGBA,
				compressionMethod: 0,
				filterMethod: 0,
				interlaceMethod: 0,
			})
		})

		test('rejects malformed buffers before encoding', () => {
			expect(() => encodePng({ width: 2, height: 2, data: new Uint8Array(3) })).toThrow(InvalidInputError)
			expect(() => encodePng(checkerboard(2), { level: 11 })).toThrow(InvalidInputError)
		})
	})

	describe('indexed', () => {
		test('two-color image uses 1-bit indices', () => {
			const image = checkerboard(4)
			const png = encodePng(image, {
				mode: 'indexed',
				palette: [
					[0, 0, 0, 255],
					[255, 255, 255, 255],
				],
			})
			const types = [...readChunks(png)].map((c) => c.type)
			expect(types).toEqual(['IHDR', 'PLTE', 'IDAT', 'IEND'])
			expect(readPngHeader(png).bitDepth).toBe(1)
			expect(readPngHeader(png).colorType).toBe(ColorType.Indexed)
			expect(decodePng(png).data).toEqual(image.data)
		})

		test('translucent entries produce a trimmed tRNS chunk', () => {
			const palette = [
				[10, 20, 30, 0],
				[40, 50, 60, 128],
				[70, 80, 90, 255],
			] as const
			const image: PixelBuffer = {
				width: 3,
				height: 1,
				data: new Uint8Array([10, 20, 30, 0, 40, 50, 60, 128, 70, 80, 90, 255]),
			}
			const png = encodePng(image, { mode: 'indexed', palette })
			const trns = [...readChunks(png)].find((c) => c.type === 'tRNS')
			expect(trns?.data).toEqual(new Uint8Array([0, 128]))
			expect(readPngHeader(png).bitDepth).toBe(2)
			expect(decodePng(png).data).toEqual(image.data)
		})

		test('uses supplied indices', () => {
			const palette = [
				[255, 0, 0, 255],
				[0, 0, 255, 255],
			] as const
			const image: PixelBuffer = { width: 2, height: 1, data: new Uint8Array(8) }
			const png = encodePng(image, { mode: 'indexed', palette, indices: new Uint8Array([1, 0]) })
			expect(Array.from(decodePng(png).data)).toEqual([0, 0, 255, 255, 255, 0, 0, 255])
		})

		test('validates palette and indices', () => {
			const image = checkerboard(2)
			expect(() => encodePng(image, { mode: 'indexed' })).toThrow('Indexed PNG requires a palette')
			expect(() => encodePng(image, { mode: 'indexed', palette: [[0, 0, 0, 255]] })).toThrow(
				'is not in the palette'
			)
			expect(() =>
				encodePng(image, { mode: 'indexed', palette: [[0, 0, 0, 255]], indices: new Uint8Array([0, 0, 1, 0]) })
			).toThrow(InvalidInputError)
		})

		test('bit depth follows palette size', () => {
			expect([2, 3, 4, 5, 16, 17, 256].map(indexBitDepth)).toEqual([1, 2, 2, 4, 4, 8, 8])
		})
	})

	describe('decode other layouts', () => {
		test('8-bit grayscale', () => {
			const png = rawPng(2, 1, ColorType.Grayscale, 8, [[0, 200]])
			expect(Array.from(decodePng(png).data)).toEqual([0, 0, 0, 255, 200, 200, 200, 255])
		})

		test('2-bit grayscale scales to 8 bits', () => {
			// samples 0, 1, 2, 3 packed into one byte
			const png = rawPng(4, 1, ColorType.Grayscale, 2, [[0b00011011]])
			const data = decodePng(png).data
			expect([data[0], data[4], data[8], data[12]]).toEqual([0, 85, 170, 255])
		})

		test('RGB with tRNS color key', () => {
			const trns = { type: 'tRNS', data: new Uint8Array([0, 1, 0, 2, 0, 3]) }
			const png = rawPng(2, 1, ColorType.RGB, 8, [[1, 2, 3, 4, 5, 6]], [trns])
			expect(Array.from(decodePng(png).data)).toEqual([1, 2, 3, 0, 4, 5, 6, 255])
		})

		test('16-bit RGBA keeps the high byte', () => {
			const png = rawPng(1, 1, ColorType.RGBA, 16, [[0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc, 0xff, 0x00]])
			expect(Array.from(decodePng(png).data)).toEqual([0x12, 0x56, 0x9a, 0xff])
		})

		test('grayscale with alpha', () => {
			const png = rawPng(1, 1, ColorType.GrayscaleAlpha, 8, [[77, 128]])
			expect(Array.from(decodePng(png).data)).toEqual([77, 77, 77, 128])
		})
	})

	describe('errors', () => {
		test('corrupt CRC', () => {
			const png = encodePng(checkerboard(2))
			png[20] ^= 0x01
			expect(() => decodePng(png)).toThrow(CorruptStreamError)
		})

		test('truncated file', () => {
			const png = encodePng(checkerboard(4))
			expect(() => decodePng(png.subarray(0, png.length - 20))).toThrow(CorruptStreamError)
		})

		test('missing IEND', () => {
			const png = encodePng(checkerboard(2))
			expect(() => decodePng(png.subarray(0, png.length - 12))).toThrow('Missing IEND chunk')
		})

		test('interlaced images are unsupported', () => {
			const ihdr = headerChunk(1, 1, ColorType.RGBA, 8)
			const data = new Uint8Array(ihdr.data)
			data[12] = 1
			const png = writeChunks([{ type: 'IHDR', data }, { type: 'IEND', data: new Uint8Array(0) }])
			expect(() => decodePng(png)).toThrow(UnsupportedFormatError)
		})

		test('invalid bit depth is unsupported', () => {
			const png = rawPng(1, 1, ColorType.RGB, 4, [[0, 0]])
			expect(() => decodePng(png)).toThrow('Unsupported bit depth 4 for color type 2')
		})

		test('unknown filter type', () => {
			const png = writeChunks([
				headerChunk(1, 1, ColorType.Grayscale, 8),
				{ type: 'IDAT', data: deflate(new Uint8Array([7, 0])) },
				{ type: 'IEND', data: new Uint8Array(0) },
			])
			expect(() => decodePng(png)).toThrow('Unknown filter type: 7')
		})

		test('indexed image without palette', () => {
			const png = rawPng(1, 1, ColorType.Indexed, 8, [[0]])
			expect(() => decodePng(png)).toThrow('Indexed image without PLTE chunk')
		})

		test('palette index out of range', () => {
			const plte = { type: 'PLTE', data: new Uint8Array([1, 2, 3]) }
			const png = rawPng(1, 1, ColorType.Indexed, 8, [[4]], [plte])
			expect(() => decodePng(png)).toThrow('Palette index 4 out of range')
		})
	})

	describe('filters', () => {
		test('paeth picks the closest neighbour', () => {
			expect(paethPredictor(1, 2, 3)).toBe(1)
			expect(paethPredictor(10, 20, 10)).toBe(20)
		})

		test('every filter is reversible', () => {
			const previous = new Uint8Array([5, 250, 3, 77, 128, 0, 9, 31])
			const current = new Uint8Array([200, 1, 99, 42, 7, 255, 128, 64])
			for (const filter of Object.values(FilterType)) {
				const filtered = filterScanline(current, previous, 4, filter)
				expect(filtered[0]).toBe(filter)
				const restored = filtered.slice(1)
				unfilterScanline(filter, restored, previous, 4)
				expect(restored).toEqual(current)
			}
		})

		test('selects Sub for a horizontal ramp', () => {
			const ramp = new Uint8Array([10, 20, 30, 40, 50, 60])
			const filtered = selectFilter(ramp, null, 1)
			expect(filtered[0]).toBe(FilterType.Sub)
			expect(Array.from(filtered.subarray(1))).toEqual([10, 10, 10, 10, 10, 10])
		})

		test('selects Up for repeated rows', () => {
			const row = new Uint8Array([90, 3, 250, 17])
			expect(selectFilter(row, row, 1)[0]).toBe(FilterType.Up)
		})
	})
})
