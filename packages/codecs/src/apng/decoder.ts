import { CorruptStreamError, type PixelBuffer, type Rgba, clonePixelBuffer, concatBytes, createPixelBuffer } from '@pixel-codec/core'
import { clearRegion, compositeOver, extractRegion, replaceRegion } from '@pixel-codec/composite'
import {
	type AnimationControl,
	BlendOp,
	ColorType,
	DisposeOp,
	type FrameControl,
	type PngHeader,
	decodeImageData,
	parseRecord,
	readChunks,
	validateHeader,
} from '../png'
import type { DecodedApng, DecodedApngFrame } from './types'

/**
 * Frame control plus its compressed data parts
 */
interface RawFrame {
	readonly control: FrameControl
	readonly parts: Uint8Array[]
}

/**
 * Frame delay in milliseconds; a zero denominator means 1/100 s
 */
export function delayToMs(control: Pick<FrameControl, 'delayNum' | 'delayDen'>): number {
	const den = control.delayDen === 0 ? 100 : control.delayDen
	return (control.delayNum * 1000) / den
}

function checkFrameBounds(control: FrameControl, header: PngHeader): void {
	if (
		control.width === 0 ||
		control.height === 0 ||
		control.xOffset + control.width > header.width ||
		control.yOffset + control.height > header.height
	) {
		throw new CorruptStreamError(`Frame ${control.sequenceNumber} lies outside the canvas`)
	}
}

/**
 * Render frames onto a canvas, applying blend and dispose operations
 */
function render(header: PngHeader, controls: readonly FrameControl[], deltas: readonly PixelBuffer[]): DecodedApngFrame[] {
	const canvas = createPixelBuffer(header.width, header.height)
	const frames: DecodedApngFrame[] = []

	controls.forEach((control, index) => {
		const delta = deltas[index]
		const region = { x: control.xOffset, y: control.yOffset, width: control.width, height: control.height }
		// A first frame cannot restore to a previous state
		const disposeOp = index === 0 && control.disposeOp === DisposeOp.Previous ? DisposeOp.Background : control.disposeOp
		const saved = disposeOp === DisposeOp.Previous ? extractRegion(canvas, region) : null

		if (control.blendOp === BlendOp.Source) {
			replaceRegion(canvas, delta, control.xOffset, control.yOffset)
		} else {
			compositeOver(canvas, delta, control.xOffset, control.yOffset)
		}

		frames.push({ control, delta, image: clonePixelBuffer(canvas), duration: delayToMs(control) })

		if (disposeOp === DisposeOp.Background) {
			clearRegion(canvas, region)
		} else if (saved) {
			replaceRegion(canvas, saved, control.xOffset, control.yOffset)
		}
	})

	return frames
}

/**
 * Decode an animated PNG. A PNG without animation control decodes as a
 * single frame holding the default image.
 */
export function decodeApng(data: Uint8Array): DecodedApng {
	let header: PngHeader | undefined
	let palette: Rgba[] | undefined
	let transparency: Uint8Array | undefined
	let animation: AnimationControl | undefined
	const defaultImage: Uint8Array[] = []
	const rawFrames: RawFrame[] = []
	let current: RawFrame | undefined
	let lastSequence = -1
	let seenData = false
	let ended = false

	const nextSequence = (sequenceNumber: number): void => {
		if (sequenceNumber <= lastSequence) {
			throw new CorruptStreamError(`Sequence number ${sequenceNumber} out of order`)
		}
		lastSequence = sequenceNumber
	}

	for (const chunk of readChunks(data)) {
		const record = parseRecord(chunk)
		if (!header && record.kind !== 'header') {
			throw new CorruptStreamError('IHDR must be the first chunk')
		}

		switch (record.kind) {
			case 'header':
				if (header) throw new CorruptStreamError('Duplicate IHDR chunk')
				validateHeader(record.header)
				header = record.header
				break
			case 'palette':
				palette = record.palette
				break
			case 'transparency':
				transparency = new Uint8Array(record.data)
				break
			case 'animationControl':
				if (seenData) throw new CorruptStreamError('acTL must precede IDAT')
				animation = record.control
				break
			case 'frameControl':
				if (!animation) throw new CorruptStreamError('fcTL without acTL')
				if (header) checkFrameBounds(record.control, header)
				nextSequence(record.control.sequenceNumber)
				current = { control: record.control, parts: [] }
				rawFrames.push(current)
				break
			case 'data':
				seenData = true
				// IDAT belongs to the first frame only when its fcTL came first
				if (current && rawFrames.length === 1) {
					current.parts.push(record.data)
				} else {
					defaultImage.push(record.data)
				}
				break
			case 'frameData':
				nextSequence(record.sequenceNumber)
				if (!current || !seenData) throw new CorruptStreamError('fdAT before image data')
				current.parts.push(record.data)
				break
			case 'end':
				ended = true
				break
			case 'ancillary':
				break
			default: {
				const unreachable: never = record
				throw new CorruptStreamError(`Unhandled record ${JSON.stringify(unreachable)}`)
			}
		}
		if (ended) break
	}

	if (!header) throw new CorruptStreamError('Missing IHDR chunk')
	if (!ended) throw new CorruptStreamError('Missing IEND chunk')
	if (!seenData) throw new CorruptStreamError('Missing IDAT chunk')
	if (header.colorType === ColorType.Indexed && !palette) {
		throw new CorruptStreamError('Indexed image without PLTE chunk')
	}

	const format = { header, palette, transparency }

	if (!animation) {
		const image = decodeImageData(concatBytes(defaultImage), header.width, header.height, format)
		const control: FrameControl = {
			sequenceNumber: 0,
			width: header.width,
			height: header.height,
			xOffset: 0,
			yOffset: 0,
			delayNum: 0,
			delayDen: 1,
			disposeOp: DisposeOp.None,
			blendOp: BlendOp.Source,
		}
		return {
			width: header.width,
			height: header.height,
			numPlays: 0,
			frames: [{ control, delta: image, image: clonePixelBuffer(image), duration: 0 }],
		}
	}

	if (rawFrames.length !== animation.numFrames) {
		throw new CorruptStreamError(`acTL declares ${animation.numFrames} frames, found ${rawFrames.length}`)
	}
	const deltas = rawFrames.map((frame) => {
		if (frame.parts.length === 0) {
			throw new CorruptStreamError(`Frame ${frame.control.sequenceNumber} has no image data`)
		}
		return decodeImageData(concatBytes(frame.parts), frame.control.width, frame.control.height, format)
	})

	return {
		width: header.width,
		height: header.height,
		numPlays: animation.numPlays,
		frames: render(header, rawFrames.map((frame) => frame.control), deltas),
	}
}
