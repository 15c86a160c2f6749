import type { Rgba } from '@pixel-codec/core'

/**
 * PNG color types
 */
export const ColorType = {
	Grayscale: 0,
	RGB: 2,
	Indexed: 3,
	GrayscaleAlpha: 4,
	RGBA: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG filter types
 */
export const FilterType = {
	None: 0,
	Sub: 1,
	Up: 2,
	Average: 3,
	Paeth: 4,
} as const

export type FilterType = (typeof FilterType)[keyof typeof FilterType]

/**
 * Frame area disposal after rendering (APNG)
 */
export const DisposeOp = {
	None: 0,
	Background: 1,
	Previous: 2,
} as const

export type DisposeOp = (typeof DisposeOp)[keyof typeof DisposeOp]

/**
 * How a frame is drawn onto the canvas (APNG)
 */
export const BlendOp = {
	Source: 0,
	Over: 1,
} as const

export type BlendOp = (typeof BlendOp)[keyof typeof BlendOp]

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE: Uint8Array = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/**
 * IHDR chunk data
 */
export interface PngHeader {
	readonly width: number
	readonly height: number
	readonly bitDepth: number
	readonly colorType: ColorType
	readonly compressionMethod: number
	readonly filterMethod: number
	readonly interlaceMethod: number
}

/**
 * acTL chunk data
 */
export interface AnimationControl {
	readonly numFrames: number
	readonly numPlays: number // 0 = infinite
}

/**
 * fcTL chunk data
 */
export interface FrameControl {
	readonly sequenceNumber: number
	readonly width: number
	readonly height: number
	readonly xOffset: number
	readonly yOffset: number
	readonly delayNum: number
	readonly delayDen: number // 0 is read as 100
	readonly disposeOp: DisposeOp
	readonly blendOp: BlendOp
}

/**
 * Chunk payload interpreted by type
 */
export type PngRecord =
	| { readonly kind: 'header'; readonly header: PngHeader }
	| { readonly kind: 'palette'; readonly palette: Rgba[] }
	| { readonly kind: 'transparency'; readonly data: Uint8Array }
	| { readonly kind: 'data'; readonly data: Uint8Array }
	| { readonly kind: 'end' }
	| { readonly kind: 'animationControl'; readonly control: AnimationControl }
	| { readonly kind: 'frameControl'; readonly control: FrameControl }
	| { readonly kind: 'frameData'; readonly sequenceNumber: number; readonly data: Uint8Array }
	| { readonly kind: 'ancillary'; readonly type: string }

/**
 * Color layout used when writing
 */
export type PngMode = 'truecolor-alpha' | 'indexed'
