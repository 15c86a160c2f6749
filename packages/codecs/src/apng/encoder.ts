import { InvalidInputError, assertPixelBuffer, parseOptions } from '@pixel-codec/core'
import { z } from 'zod'
import {
	BlendOp,
	type ChunkInput,
	ColorType,
	DisposeOp,
	type FrameControl,
	animationControlChunk,
	compressRgba,
	frameControlChunk,
	frameDataChunk,
	headerChunk,
	writeChunks,
} from '../png'
import type { ApngAnimation, ApngEncodeOptions, BlendMethod, DisposeMethod } from './types'

const optionsSchema = z.object({
	numPlays: z.number().int().min(0).max(0x7fffffff).default(0),
	level: z.number().int().min(0).max(9).default(6),
})

const DISPOSE_OPS: Record<DisposeMethod, DisposeOp> = {
	none: DisposeOp.None,
	background: DisposeOp.Background,
	previous: DisposeOp.Previous,
}

const BLEND_OPS: Record<BlendMethod, BlendOp> = {
	source: BlendOp.Source,
	over: BlendOp.Over,
}

function gcd(a: number, b: number): number {
	while (b !== 0) [a, b] = [b, a % b]
	return a
}

/**
 * Milliseconds as a delay fraction with both terms in 16 bits
 */
export function toDelayFraction(ms: number): { delayNum: number; delayDen: number } {
	for (const den of [1000, 100, 10, 1]) {
		const num = Math.round((ms * den) / 1000)
		if (num <= 0xffff) {
			const divisor = gcd(num, den)
			return { delayNum: num / divisor, delayDen: den / divisor }
		}
	}
	throw new InvalidInputError(`Frame duration ${ms}ms is too long`)
}

/**
 * Sequenced chunk in write order
 */
interface PlannedChunk {
	readonly chunk: ChunkInput
	readonly sequenceNumber?: number
}

/**
 * fcTL and fdAT sequence numbers must strictly increase
 */
export function checkSequenceNumbers(sequenceNumbers: readonly number[]): void {
	for (let i = 1; i < sequenceNumbers.length; i++) {
		if (sequenceNumbers[i] <= sequenceNumbers[i - 1]) {
			throw new InvalidInputError(
				`Sequence number ${sequenceNumbers[i]} does not follow ${sequenceNumbers[i - 1]}`,
				{ metadata: { index: i } }
			)
		}
	}
}

function validate(animation: ApngAnimation): void {
	const { width, height, frames } = animation
	if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
		throw new InvalidInputError(`Invalid canvas size ${width}x${height}`)
	}
	if (frames.length === 0) {
		throw new InvalidInputError('Animation needs at least one frame')
	}

	frames.forEach((frame, index) => {
		assertPixelBuffer(frame.image, `frame ${index}`)
		const x = frame.x ?? 0
		const y = frame.y ?? 0
		if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0) {
			throw new InvalidInputError(`Frame ${index} has invalid offset ${x},${y}`)
		}
		if (x + frame.image.width > width || y + frame.image.height > height) {
			throw new InvalidInputError(`Frame ${index} extends outside the ${width}x${height} canvas`)
		}
		if (!Number.isFinite(frame.duration) || frame.duration < 0) {
			throw new InvalidInputError(`Frame ${index} has invalid duration ${frame.duration}`)
		}
	})

	const first = frames[0]
	if ((first.x ?? 0) !== 0 || (first.y ?? 0) !== 0 || first.image.width !== width || first.image.height !== height) {
		throw new InvalidInputError('First frame must cover the whole canvas')
	}
}

/**
 * Encode frames as an animated PNG. The first frame doubles as the
 * default image shown by decoders without animation support.
 */
export function encodeApng(animation: ApngAnimation, options: ApngEncodeOptions = {}): Uint8Array {
	const { numPlays, level } = parseOptions(optionsSchema, options, 'APNG encode')
	validate(animation)

	const { width, height, frames } = animation
	const plan: PlannedChunk[] = [
		{ chunk: headerChunk(width, height, ColorType.RGBA, 8) },
		{ chunk: animationControlChunk({ numFrames: frames.length, numPlays }) },
	]

	let sequenceNumber = 0
	frames.forEach((frame, index) => {
		const control: FrameControl = {
			sequenceNumber: sequenceNumber++,
			width: frame.image.width,
			height: frame.image.height,
			xOffset: frame.x ?? 0,
			yOffset: frame.y ?? 0,
			...toDelayFraction(frame.duration),
			disposeOp: DISPOSE_OPS[frame.dispose ?? 'none'],
			blendOp: BLEND_OPS[frame.blend ?? 'source'],
		}
		plan.push({ chunk: frameControlChunk(control), sequenceNumber: control.sequenceNumber })

		const compressed = compressRgba(frame.image, level)
		if (index === 0) {
			plan.push({ chunk: { type: 'IDAT', data: compressed } })
		} else {
			const seq = sequenceNumber++
			plan.push({ chunk: frameDataChunk(seq, compressed), sequenceNumber: seq })
		}
	})
	plan.push({ chunk: { type: 'IEND', data: new Uint8Array(0) } })

	checkSequenceNumbers(plan.flatMap((entry) => (entry.sequenceNumber === undefined ? [] : [entry.sequenceNumber])))
	return writeChunks(plan.map((entry) => entry.chunk))
}
