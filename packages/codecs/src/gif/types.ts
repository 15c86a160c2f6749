/**
 * GIF block layout and frame types
 */

import type { QuantizeAlgorithm } from '@pixel-codec/color'
import type { Palette, PixelBuffer } from '@pixel-codec/core'

export const GIF87A = 'GIF87a'
export const GIF89A = 'GIF89a'

export const EXTENSION_INTRODUCER = 0x21
export const IMAGE_SEPARATOR = 0x2c
export const TRAILER = 0x3b

export const GRAPHIC_CONTROL_EXTENSION = 0xf9
export const APPLICATION_EXTENSION = 0xff

/** Application identifiers carrying the loop count */
export const LOOP_EXTENSION_IDS = ['NETSCAPE2.0', 'ANIMEXTS1.0'] as const

export const DisposalCode = {
	Unspecified: 0,
	Keep: 1,
	RestoreBackground: 2,
	RestorePrevious: 3,
} as const
export type DisposalCode = (typeof DisposalCode)[keyof typeof DisposalCode]

/** What happens to a frame's area before the next frame is drawn */
export type GifDisposal = 'none' | 'keep' | 'background' | 'previous'

export interface LogicalScreenDescriptor {
	readonly width: number
	readonly height: number
	readonly hasGlobalColorTable: boolean
	readonly colorResolution: number
	readonly sortFlag: boolean
	/** Size field N; the table holds 2^(N+1) entries */
	readonly globalColorTableSize: number
	readonly backgroundColorIndex: number
	readonly pixelAspectRatio: number
}

export interface GraphicControlExtension {
	readonly disposal: GifDisposal
	readonly userInputFlag: boolean
	readonly transparentIndex: number | null
	readonly delayCentiseconds: number
}

export interface ImageDescriptor {
	readonly left: number
	readonly top: number
	readonly width: number
	readonly height: number
	readonly hasLocalColorTable: boolean
	readonly interlaced: boolean
	readonly sortFlag: boolean
	readonly localColorTableSize: number
}

/**
 * One image block with its decompressed indices in row order
 */
export interface GifFrame {
	readonly descriptor: ImageDescriptor
	readonly localColorTable: Palette | null
	readonly graphicControl: GraphicControlExtension | null
	readonly minCodeSize: number
	readonly indices: Uint8Array
}

/**
 * Parsed block structure of a GIF file
 */
export interface GifImage {
	readonly version: string
	readonly screen: LogicalScreenDescriptor
	readonly globalColorTable: Palette | null
	/** NETSCAPE2.0 loop count; null when the extension is absent */
	readonly loopCount: number | null
	readonly frames: GifFrame[]
}

export interface GifFrameInput {
	readonly image: PixelBuffer
	/** Delay in milliseconds, stored rounded to 1/100 s */
	readonly delay: number
	readonly disposal?: GifDisposal
	readonly x?: number
	readonly y?: number
}

export interface GifEncodeOptions {
	/** Logical screen width, default the widest frame extent */
	width?: number
	/** Logical screen height, default the tallest frame extent */
	height?: number
	/** 0 loops forever */
	loopCount?: number
	/** Used for frames with more than 256 colors */
	quantizer?: QuantizeAlgorithm
}

export interface DecodedGifFrame {
	/** The frame's own pixels; transparent where the frame is transparent */
	readonly delta: PixelBuffer
	/** Full canvas after drawing this frame */
	readonly image: PixelBuffer
	/** Milliseconds */
	readonly delay: number
	readonly delayCentiseconds: number
	readonly disposal: GifDisposal
	readonly left: number
	readonly top: number
	readonly transparentIndex: number | null
}

export interface DecodedGif {
	readonly width: number
	readonly height: number
	readonly loopCount: number | null
	readonly frames: DecodedGifFrame[]
}
