import { clearRegion, compositeOver, extractRegion, replaceRegion } from '@pixel-codec/composite'
import {
	ByteReader,
	CorruptStreamError,
	type Palette,
	type PixelBuffer,
	type Rect,
	type Rgba,
	clonePixelBuffer,
	concatBytes,
	createPixelBuffer,
} from '@pixel-codec/core'
import { lzwDecompress } from './lzw'
import {
	APPLICATION_EXTENSION,
	type DecodedGif,
	type DecodedGifFrame,
	EXTENSION_INTRODUCER,
	GIF87A,
	GIF89A,
	GRAPHIC_CONTROL_EXTENSION,
	type GifDisposal,
	type GifFrame,
	type GifImage,
	type GraphicControlExtension,
	IMAGE_SEPARATOR,
	type ImageDescriptor,
	LOOP_EXTENSION_IDS,
	type LogicalScreenDescriptor,
	TRAILER,
} from './types'

const DISPOSALS: readonly GifDisposal[] = ['none', 'keep', 'background', 'previous']

/** Interlace passes: first row and row step */
const INTERLACE_PASSES = [
	[0, 8],
	[4, 8],
	[2, 4],
	[1, 2],
] as const

function readScreenDescriptor(reader: ByteReader): LogicalScreenDescriptor {
	const width = reader.u16le()
	const height = reader.u16le()
	const packed = reader.u8()
	return {
		width,
		height,
		hasGlobalColorTable: (packed & 0x80) !== 0,
		colorResolution: ((packed >> 4) & 0x07) + 1,
		sortFlag: (packed & 0x08) !== 0,
		globalColorTableSize: packed & 0x07,
		backgroundColorIndex: reader.u8(),
		pixelAspectRatio: reader.u8(),
	}
}

function readColorTable(reader: ByteReader, sizeField: number): Palette {
	const table: Rgba[] = []
	for (let i = 0; i < 1 << (sizeField + 1); i++) {
		table.push([reader.u8(), reader.u8(), reader.u8(), 255])
	}
	return table
}

function readSubBlocks(reader: ByteReader): Uint8Array {
	const parts: Uint8Array[] = []
	for (let size = reader.u8(); size !== 0; size = reader.u8()) {
		parts.push(reader.bytes(size))
	}
	return concatBytes(parts)
}

function readGraphicControl(reader: ByteReader): GraphicControlExtension {
	const blockSize = reader.u8()
	if (blockSize !== 4) {
		throw new CorruptStreamError(`Invalid graphic control block size ${blockSize}`)
	}
	const packed = reader.u8()
	const delayCentiseconds = reader.u16le()
	const transparentIndex = reader.u8()
	if (reader.u8() !== 0) {
		throw new CorruptStreamError('Missing graphic control block terminator')
	}
	// Reserved disposal codes 4-7 behave like "none"
	const disposal = DISPOSALS[(packed >> 2) & 0x07] ?? 'none'
	return {
		disposal,
		userInputFlag: (packed & 0x02) !== 0,
		transparentIndex: packed & 0x01 ? transparentIndex : null,
		delayCentiseconds,
	}
}

/**
 * Loop count from an application extension, or null for other applications
 */
function readApplication(reader: ByteReader): number | null {
	const blockSize = reader.u8()
	const identifier = reader.ascii(blockSize)
	const data = readSubBlocks(reader)
	const isLoop = LOOP_EXTENSION_IDS.some((id) => id === identifier)
	if (!isLoop || data.length < 3 || data[0] !== 1) return null
	return data[1] | (data[2] << 8)
}

function readImageDescriptor(reader: ByteReader): ImageDescriptor {
	const left = reader.u16le()
	const top = reader.u16le()
	const width = reader.u16le()
	const height = reader.u16le()
	const packed = reader.u8()
	return {
		left,
		top,
		width,
		height,
		hasLocalColorTable: (packed & 0x80) !== 0,
		interlaced: (packed & 0x40) !== 0,
		sortFlag: (packed & 0x20) !== 0,
		localColorTableSize: packed & 0x07,
	}
}

/**
 * Reorder interlaced rows into top-to-bottom order
 */
export function deinterlace(indices: Uint8Array, width: number, height: number): Uint8Array {
	const out = new Uint8Array(indices.length)
	let row = 0
	for (const [start, step] of INTERLACE_PASSES) {
		for (let y = start; y < height; y += step) {
			out.set(indices.subarray(row * width, (row + 1) * width), y * width)
			row++
		}
	}
	return out
}

/**
 * Parse the block structure of a GIF file
 */
export function parseGif(data: Uint8Array): GifImage {
	const reader = new ByteReader(data, 0, 'GIF')
	const version = data.length >= 6 ? reader.ascii(6) : ''
	if (version !== GIF87A && version !== GIF89A) {
		throw new CorruptStreamError('Invalid GIF signature')
	}

	const screen = readScreenDescriptor(reader)
	const globalColorTable = screen.hasGlobalColorTable ? readColorTable(reader, screen.globalColorTableSize) : null
	const frames: GifFrame[] = []
	let loopCount: number | null = null
	let graphicControl: GraphicControlExtension | null = null

	for (let introducer = reader.u8(); introducer !== TRAILER; introducer = reader.u8()) {
		if (introducer === EXTENSION_INTRODUCER) {
			const label = reader.u8()
			if (label === GRAPHIC_CONTROL_EXTENSION) {
				graphicControl = readGraphicControl(reader)
			} else if (label === APPLICATION_EXTENSION) {
				loopCount = readApplication(reader) ?? loopCount
			} else {
				readSubBlocks(reader)
			}
		} else if (introducer === IMAGE_SEPARATOR) {
			const descriptor = readImageDescriptor(reader)
			const localColorTable = descriptor.hasLocalColorTable
				? readColorTable(reader, descriptor.localColorTableSize)
				: null
			if (!localColorTable && !globalColorTable) {
				throw new CorruptStreamError(`Frame ${frames.length} has no color table`)
			}

			const minCodeSize = reader.u8()
			const pixels = descriptor.width * descriptor.height
			const decoded = lzwDecompress(readSubBlocks(reader), minCodeSize, pixels)
			const indices = descriptor.interlaced ? deinterlace(decoded, descriptor.width, descriptor.height) : decoded

			frames.push({ descriptor, localColorTable, graphicControl, minCodeSize, indices })
			graphicControl = null
		} else {
			throw new CorruptStreamError(`Unknown GIF block 0x${introducer.toString(16)}`)
		}
	}

	return { version, screen, globalColorTable, loopCount, frames }
}

/**
 * Expand one frame's indices to RGBA; the transparent index becomes alpha 0
 */
function frameDelta(frame: GifFrame, table: Palette, frameIndex: number): PixelBuffer {
	const { width, height } = frame.descriptor
	const transparent = frame.graphicControl?.transparentIndex ?? null
	const delta = createPixelBuffer(width, height)
	frame.indices.forEach((index, i) => {
		if (index === transparent) return
		if (index >= table.length) {
			throw new CorruptStreamError(`Frame ${frameIndex} uses color ${index} outside its ${table.length}-entry table`)
		}
		const [r, g, b] = table[index]
		delta.data.set([r, g, b, 255], i * 4)
	})
	return delta
}

/**
 * Decode every frame. Each composite applies the previous frame's disposal
 * and then draws the frame's opaque pixels; the background is transparent.
 */
export function decodeGif(data: Uint8Array): DecodedGif {
	const gif = parseGif(data)
	const { width, height } = gif.screen
	const canvas = createPixelBuffer(width, height)
	const frames: DecodedGifFrame[] = []

	let pending: { disposal: GifDisposal; region: Rect } | null = null
	let saved: PixelBuffer | null = null

	gif.frames.forEach((frame, index) => {
		if (pending?.disposal === 'background') {
			clearRegion(canvas, pending.region)
		} else if (pending?.disposal === 'previous' && saved) {
			replaceRegion(canvas, saved, pending.region.x, pending.region.y)
		}

		const { left, top } = frame.descriptor
		const region: Rect = { x: left, y: top, width: frame.descriptor.width, height: frame.descriptor.height }
		const disposal = frame.graphicControl?.disposal ?? 'none'
		saved = disposal === 'previous' ? extractRegion(canvas, region) : null

		const table = frame.localColorTable ?? gif.globalColorTable ?? []
		const delta = frameDelta(frame, table, index)
		compositeOver(canvas, delta, left, top)

		const delayCentiseconds = frame.graphicControl?.delayCentiseconds ?? 0
		frames.push({
			delta,
			image: clonePixelBuffer(canvas),
			delay: delayCentiseconds * 10,
			delayCentiseconds,
			disposal,
			left,
			top,
			transparentIndex: frame.graphicControl?.transparentIndex ?? null,
		})
		pending = { disposal, region }
	})

	return { width, height, loopCount: gif.loopCount, frames }
}
