import type { PixelBuffer } from '@pixel-codec/core'
import type { FrameControl } from '../png'

/**
 * What happens to the frame area before the next frame is drawn
 */
export type DisposeMethod = 'none' | 'background' | 'previous'

/**
 * Whether the frame replaces or is alpha-composited over its area
 */
export type BlendMethod = 'source' | 'over'

/**
 * Frame supplied to the encoder
 */
export interface ApngFrameInput {
	readonly image: PixelBuffer
	/** Display time in milliseconds */
	readonly duration: number
	readonly x?: number
	readonly y?: number
	readonly dispose?: DisposeMethod
	readonly blend?: BlendMethod
}

/**
 * Canvas size and frames; the first frame is also the default image
 */
export interface ApngAnimation {
	readonly width: number
	readonly height: number
	readonly frames: readonly ApngFrameInput[]
}

/**
 * APNG encode options
 */
export interface ApngEncodeOptions {
	/** Play count, 0 = infinite */
	numPlays?: number
	/** Deflate level 0-9 */
	level?: number
}

/**
 * Decoded frame: its own pixels and the canvas after drawing it
 */
export interface DecodedApngFrame {
	readonly control: FrameControl
	/** Frame region pixels as stored */
	readonly delta: PixelBuffer
	/** Full canvas composite */
	readonly image: PixelBuffer
	/** Display time in milliseconds */
	readonly duration: number
}

/**
 * Decoded animation
 */
export interface DecodedApng {
	readonly width: number
	readonly height: number
	readonly numPlays: number
	readonly frames: readonly DecodedApngFrame[]
}
