/**
 * Atlas packing types
 */

import type { PixelBuffer } from '@pixel-codec/core'

export interface NamedSource {
	readonly id: string
	readonly image: PixelBuffer
}

/** Plain buffers are named by their position in the input */
export type AtlasSource = PixelBuffer | NamedSource

export interface PackOptions {
	/** Page width limit */
	maxWidth: number
	/** Page height limit */
	maxHeight: number
	/** Allow 90° clockwise rotation (default false) */
	allowRotation?: boolean
	/** Empty pixels kept around every sprite (default 0) */
	padding?: number
	/** Crop fully transparent borders before packing (default true) */
	trim?: boolean
}

export interface AtlasPlacement {
	readonly id: string
	readonly page: number
	readonly x: number
	readonly y: number
	/** Size as placed, after rotation */
	readonly width: number
	readonly height: number
	readonly rotated: boolean
	/** Whether transparent borders were cropped */
	readonly trimmed: boolean
	/** Offset of the packed area within the source image */
	readonly trimX: number
	readonly trimY: number
	readonly sourceWidth: number
	readonly sourceHeight: number
}

export interface AtlasResult {
	readonly pages: PixelBuffer[]
	/** In source order */
	readonly placements: AtlasPlacement[]
}

export interface AtlasJsonPage {
	index: number
	width: number
	height: number
	sprites: number
	image?: string
}

export interface AtlasJsonSprite {
	page: number
	x: number
	y: number
	width: number
	height: number
	rotated: boolean
	trimmed: boolean
	trimX: number
	trimY: number
	sourceWidth: number
	sourceHeight: number
}

export interface AtlasJson {
	pages: AtlasJsonPage[]
	sprites: Record<string, AtlasJsonSprite>
}
