import { CorruptStreamError, InvalidInputError, type PixelBuffer } from '@pixel-codec/core'
import { describe, expect, test } from 'vitest'
import {
	BlendOp,
	ColorType,
	DisposeOp,
	animationControlChunk,
	compressRgba,
	decodePng,
	encodePng,
	frameControlChunk,
	headerChunk,
	readChunks,
	writeChunks,
} from '../png'
import { decodeApng, delayToMs } from './decoder'
import { checkSequenceNumbers, encodeApng, toDelayFraction } from './encoder'

function solid(width: number, height: number, rgba: [number, number, number, number]): PixelBuffer {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < width * height; i++) data.set(rgba, i * 4)
	return { width, height, data }
}

const RED: [number, number, number, number] = [255, 0, 0, 255]
const GREEN: [number, number, number, number] = [0, 255, 0, 255]
const BLUE: [number, number, number, number] = [0, 0, 255, 255]

describe('APNG', () => {
	describe('encodeApng', () => {
		test('writes frame chunks in sequence', () => {
			const apng = encodeApng({
				width: 2,
				height: 2,
				frames: [
					{ image: solid(2, 2, RED), duration: 100 },
					{ image: solid(2, 2, BLUE), duration: 100 },
				],
			})
			const chunks = [...readChunks(apng)]
			expect(chunks.map((c) => c.type)).toEqual(['IHDR', 'acTL', 'fcTL', 'IDAT', 'fcTL', 'fdAT', 'IEND'])

			const sequence = chunks
				.filter((c) => c.type === 'fcTL' || c.type === 'fdAT')
				.map((c) => ((c.data[0] << 24) | (c.data[1] << 16) | (c.data[2] << 8) | c.data[3]) >>> 0)
			expect(sequence).toEqual([0, 1, 2])
		})

		test('round trips frames and timing', () => {
			const frames = [
				{ image: solid(2, 2, RED), duration: 100 },
				{ image: solid(2, 2, BLUE), duration: 250 },
			]
			const decoded = decodeApng(encodeApng({ width: 2, height: 2, frames }, { numPlays: 3 }))
			expect(decoded.width).toBe(2)
			expect(decoded.numPlays).toBe(3)
			expect(decoded.frames).toHaveLength(2)
			expect(decoded.frames[0].image.data).toEqual(frames[0].image.data)
			expect(decoded.frames[1].image.data).toEqual(frames[1].image.data)
			expect(decoded.frames.map((f) => f.duration)).toEqual([100, 250])
			expect(decoded.frames[0].control.delayNum).toBe(1)
			expect(decoded.frames[0].control.delayDen).toBe(10)
		})

		test('plain decoders see the first frame', () => {
			const apng = encodeApng({
				width: 1,
				height: 1,
				frames: [
					{ image: solid(1, 1, GREEN), duration: 10 },
					{ image: solid(1, 1, BLUE), duration: 10 },
				],
			})
			expect(Array.from(decodePng(apng).data)).toEqual(GREEN)
		})

		test('validates before encoding', () => {
			expect(() => encodeApng({ width: 2, height: 2, frames: [] })).toThrow('Animation needs at least one frame')
			expect(() =>
				encodeApng({
					width: 2,
					height: 2,
					frames: [
						{ image: solid(2, 2, RED), duration: 10 },
						{ image: solid(2, 2, RED), duration: 10, x: 1 },
					],
				})
			).toThrow('Frame 1 extends outside the 2x2 canvas')
			expect(() => encodeApng({ width: 2, height: 2, frames: [{ image: solid(1, 1, RED), duration: 10 }] })).toThrow(
				'First frame must cover the whole canvas'
			)
			expect(() =>
				encodeApng({ width: 1, height: 1, frames: [{ image: solid(1, 1, RED), duration: -1 }] })
			).toThrow(InvalidInputError)
		})

		test('reduces delays to 16-bit fractions', () => {
			expect(toDelayFraction(100)).toEqual({ delayNum: 1, delayDen: 10 })
			expect(toDelayFraction(33)).toEqual({ delayNum: 33, delayDen: 1000 })
			expect(toDelayFraction(0)).toEqual({ delayNum: 0, delayDen: 1 })
			expect(toDelayFraction(70000)).toEqual({ delayNum: 70, delayDen: 1 })
		})

		test('checks sequence numbers strictly increase', () => {
			expect(() => checkSequenceNumbers([0, 2, 5])).not.toThrow()
			expect(() => checkSequenceNumbers([0, 1, 1])).toThrow(InvalidInputError)
		})
	})

	describe('decodeApng compositing', () => {
		test('blend over keeps the canvas under a partial frame', () => {
			const decoded = decodeApng(
				encodeApng({
					width: 2,
					height: 1,
					frames: [
						{ image: solid(2, 1, RED), duration: 10 },
						{ image: solid(1, 1, BLUE), duration: 10, x: 1, blend: 'over' },
					],
				})
			)
			expect(decoded.frames[1].delta.width).toBe(1)
			expect(Array.from(decoded.frames[1].image.data)).toEqual([...RED, ...BLUE])
		})

		test('dispose background clears the frame area', () => {
			const decoded = decodeApng(
				encodeApng({
					width: 2,
					height: 1,
					frames: [
						{ image: solid(2, 1, RED), duration: 10, dispose: 'background' },
						{ image: solid(1, 1, GREEN), duration: 10 },
					],
				})
			)
			expect(Array.from(decoded.frames[1].image.data)).toEqual([...GREEN, 0, 0, 0, 0])
		})

		test('dispose previous restores the area', () => {
			const decoded = decodeApng(
				encodeApng({
					width: 2,
					height: 1,
					frames: [
						{ image: solid(2, 1, RED), duration: 10 },
						{ image: solid(1, 1, BLUE), duration: 10, dispose: 'previous' },
						{ image: solid(1, 1, GREEN), duration: 10, x: 1 },
					],
				})
			)
			expect(Array.from(decoded.frames[1].image.data)).toEqual([...BLUE, ...RED])
			expect(Array.from(decoded.frames[2].image.data)).toEqual([...RED, ...GREEN])
		})

		test('a plain PNG decodes as one frame', () => {
			const decoded = decodeApng(encodePng(solid(1, 1, RED)))
			expect(decoded.frames).toHaveLength(1)
			expect(Array.from(decoded.frames[0].image.data)).toEqual(RED)
		})

		test('converts delays to milliseconds', () => {
			expect(delayToMs({ delayNum: 5, delayDen: 0 })).toBe(50)
			expect(delayToMs({ delayNum: 1, delayDen: 3 })).toBeCloseTo(333.33, 2)
		})
	})

	describe('decodeApng errors', () => {
		const frameControl = (sequenceNumber: number) =>
			frameControlChunk({
				sequenceNumber,
				width: 1,
				height: 1,
				xOffset: 0,
				yOffset: 0,
				delayNum: 1,
				delayDen: 10,
				disposeOp: DisposeOp.None,
				blendOp: BlendOp.Source,
			})
		const idat = { type: 'IDAT', data: compressRgba(solid(1, 1, RED)) }
		const iend = { type: 'IEND', data: new Uint8Array(0) }

		test('out of order sequence numbers', () => {
			const apng = writeChunks([
				headerChunk(1, 1, ColorType.RGBA, 8),
				animationControlChunk({ numFrames: 2, numPlays: 0 }),
				frameControl(0),
				idat,
				frameControl(0),
				iend,
			])
			expect(() => decodeApng(apng)).toThrow('Sequence number 0 out of order')
		})

		test('frame count mismatch', () => {
			const apng = writeChunks([
				headerChunk(1, 1, ColorType.RGBA, 8),
				animationControlChunk({ numFrames: 3, numPlays: 0 }),
				frameControl(0),
				idat,
				iend,
			])
			expect(() => decodeApng(apng)).toThrow('acTL declares 3 frames, found 1')
		})

		test('acTL after IDAT', () => {
			const apng = writeChunks([
				headerChunk(1, 1, ColorType.RGBA, 8),
				idat,
				animationControlChunk({ numFrames: 1, numPlays: 0 }),
				iend,
			])
			expect(() => decodeApng(apng)).toThrow(CorruptStreamError)
		})

		test('hidden default image is skipped', () => {
			const apng = writeChunks([
				headerChunk(1, 1, ColorType.RGBA, 8),
				animationControlChunk({ numFrames: 1, numPlays: 0 }),
				idat,
				frameControl(0),
				{ type: 'fdAT', data: new Uint8Array([0, 0, 0, 1, ...compressRgba(solid(1, 1, BLUE))]) },
				iend,
			])
			const decoded = decodeApng(apng)
			expect(decoded.frames).toHaveLength(1)
			expect(Array.from(decoded.frames[0].image.data)).toEqual(BLUE)
		})
	})
})
