import { describe, expect, test } from 'vitest'
import { z } from 'zod'
import {
	ByteReader,
	ByteWriter,
	CodecError,
	CorruptStreamError,
	InvalidInputError,
	assertPalette,
	assertPixelBuffer,
	concatBytes,
	crc32,
	createPixelBuffer,
	detectFormat,
	packRgba,
	parseOptions,
	unpackRgba,
	updateCrc32,
} from './index'

describe('core', () => {
	describe('ByteReader', () => {
		test('reads little and big endian integers', () => {
			const reader = new ByteReader(new Uint8Array([0x01, 0x02, 0x03, 0x04, 0xff, 0xff, 0x12, 0x34]))
			expect(reader.u16le()).toBe(0x0201)
			expect(reader.u16be()).toBe(0x0304)
			expect(reader.i16le()).toBe(-1)
			expect(reader.u16be()).toBe(0x1234)
			expect(reader.remaining).toBe(0)
		})

		test('reads unsigned 32-bit values without sign', () => {
			const reader = new ByteReader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfe]))
			expect(reader.u32le()).toBe(0xffffffff)
			expect(reader.u32be()).toBe(0xfffffffe)
		})

		test('throws CorruptStreamError on short reads', () => {
			const reader = new ByteReader(new Uint8Array([1, 2, 3]), 0, 'header')
			reader.skip(2)
			expect(() => reader.u16le()).toThrow(CorruptStreamError)
			expect(() => reader.u16le()).toThrow('Truncated header')
		})

		test('returns views for bytes and decodes ascii', () => {
			const reader = new ByteReader(new Uint8Array([0x49, 0x48, 0x44, 0x52, 9]))
			expect(reader.ascii(4)).toBe('IHDR')
			expect(reader.bytes(1)).toEqual(new Uint8Array([9]))
		})
	})

	describe('ByteWriter', () => {
		test('grows past its initial capacity', () => {
			const writer = new ByteWriter(16)
			for (let i = 0; i < 40; i++) writer.u8(i)
			writer.u16le(0x1234).u32be(0xa1b2c3d4).ascii('GIF')
			const bytes = writer.toBytes()
			expect(bytes.length).toBe(40 + 2 + 4 + 3)
			expect(Array.from(bytes.subarray(40))).toEqual([0x34, 0x12, 0xa1, 0xb2, 0xc3, 0xd4, 0x47, 0x49, 0x46])
		})

		test('writes 32-bit little endian', () => {
			expect(Array.from(new ByteWriter().u32le(0x01020304).toBytes())).toEqual([4, 3, 2, 1])
		})
	})

	test('concatBytes joins parts in order', () => {
		expect(concatBytes([new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3])])).toEqual(
			new Uint8Array([1, 2, 3])
		)
	})

	describe('crc32', () => {
		test('matches the standard check value', () => {
			const ascii = new TextEncoder().encode('123456789')
			expect(crc32(ascii)).toBe(0xcbf43926)
		})

		test('continues across calls', () => {
			const ascii = new TextEncoder().encode('123456789')
			expect(updateCrc32(crc32(ascii, 0, 4), ascii, 4)).toBe(0xcbf43926)
		})

		test('empty input is zero', () => {
			expect(crc32(new Uint8Array(0))).toBe(0)
		})
	})

	describe('errors', () => {
		test('subclasses carry code and name', () => {
			const error = new CorruptStreamError('bad crc', { metadata: { chunk: 'IDAT' } })
			expect(error).toBeInstanceOf(CodecError)
			expect(error.code).toBe('CORRUPT_STREAM')
			expect(error.name).toBe('CorruptStreamError')
			expect(error.metadata).toEqual({ chunk: 'IDAT' })
		})
	})

	describe('validation', () => {
		const schema = z.object({ level: z.number().int().min(0).max(9).default(6) })

		test('applies defaults', () => {
			expect(parseOptions(schema, undefined, 'deflate')).toEqual({ level: 6 })
		})

		test('reports the failing path', () => {
			expect(() => parseOptions(schema, { level: 12 }, 'deflate')).toThrow(InvalidInputError)
			try {
				parseOptions(schema, { level: 12 }, 'deflate')
			} catch (error) {
				expect(error).toBeInstanceOf(InvalidInputError)
				if (error instanceof InvalidInputError) {
					expect(error.message).toContain('level')
					expect(error.metadata.issues).toHaveLength(1)
				}
			}
		})

		test('assertPixelBuffer checks sample count', () => {
			expect(() => assertPixelBuffer(createPixelBuffer(2, 2))).not.toThrow()
			expect(() => assertPixelBuffer({ width: 2, height: 2, data: new Uint8Array(15) })).toThrow(
				InvalidInputError
			)
			expect(() => assertPixelBuffer({ width: 0, height: 2, data: new Uint8Array(0) })).toThrow(
				InvalidInputError
			)
		})

		test('assertPalette checks size and range', () => {
			expect(() => assertPalette([[0, 0, 0, 255]])).not.toThrow()
			expect(() => assertPalette([])).toThrow(InvalidInputError)
			expect(() => assertPalette([[256, 0, 0, 255]])).toThrow(InvalidInputError)
		})
	})

	test('packRgba round trips', () => {
		const key = packRgba(255, 128, 1, 200)
		expect(key).toBe(0xff8001c8)
		expect(unpackRgba(key)).toEqual([255, 128, 1, 200])
	})

	describe('detectFormat', () => {
		test('png and gif signatures', () => {
			expect(detectFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe('png')
			expect(detectFormat(new TextEncoder().encode('GIF89a'))).toBe('gif')
		})

		test('apng when acTL precedes IDAT', () => {
			const writer = new ByteWriter()
			writer.bytes(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))
			writer.u32be(13).ascii('IHDR').bytes(new Uint8Array(13)).u32be(0)
			writer.u32be(8).ascii('acTL').bytes(new Uint8Array(8)).u32be(0)
			expect(detectFormat(writer.toBytes())).toBe('apng')
		})

		test('aseprite magic at offset 4', () => {
			const header = new Uint8Array(128)
			header[4] = 0xe0
			header[5] = 0xa5
			expect(detectFormat(header)).toBe('aseprite')
		})

		test('unknown data', () => {
			expect(detectFormat(new Uint8Array([1, 2, 3]))).toBeNull()
		})
	})
})
