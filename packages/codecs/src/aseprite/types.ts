/**
 * Aseprite file layout and parsed sprite types
 */

import type { BlendMode } from '@pixel-codec/composite'
import type { PixelBuffer, Rgba } from '@pixel-codec/core'

export const FILE_MAGIC = 0xa5e0
export const FRAME_MAGIC = 0xf1fa
export const HEADER_SIZE = 128

export const ColorDepth = {
	Indexed: 8,
	Grayscale: 16,
	Rgba: 32,
} as const
export type ColorDepth = (typeof ColorDepth)[keyof typeof ColorDepth]

export const ChunkType = {
	OldPalette: 0x0004,
	OldPalette64: 0x0011,
	Layer: 0x2004,
	Cel: 0x2005,
	Tags: 0x2018,
	Palette: 0x2019,
} as const
export type ChunkType = (typeof ChunkType)[keyof typeof ChunkType]

export const CelType = {
	Raw: 0,
	Linked: 1,
	Compressed: 2,
	CompressedTilemap: 3,
} as const
export type CelType = (typeof CelType)[keyof typeof CelType]

export const LayerType = {
	Image: 0,
	Group: 1,
	Tilemap: 2,
} as const
export type LayerType = (typeof LayerType)[keyof typeof LayerType]

/** Header flag: layer opacity fields are meaningful */
export const FLAG_LAYER_OPACITY = 1

export type TagDirection = 'forward' | 'reverse' | 'ping-pong' | 'ping-pong-reverse'

export interface AsepriteHeader {
	readonly fileSize: number
	readonly frameCount: number
	readonly width: number
	readonly height: number
	readonly colorDepth: ColorDepth
	readonly flags: number
	readonly transparentIndex: number
	readonly colorCount: number
	readonly pixelWidth: number
	readonly pixelHeight: number
}

export interface AsepriteLayer {
	readonly name: string
	readonly flags: number
	readonly type: LayerType
	readonly childLevel: number
	readonly blendMode: BlendMode
	/** 0-255 */
	readonly opacity: number
	/** Visible flag of the layer itself */
	readonly visible: boolean
	/** Index of the enclosing group layer */
	readonly parent: number | null
}

/** Decoded RGBA pixels of a cel; linked cels hold the same object */
export type CelImage = PixelBuffer

export interface AsepriteCel {
	readonly layerIndex: number
	readonly x: number
	readonly y: number
	/** 0-255 */
	readonly opacity: number
	readonly zIndex: number
	readonly type: 'raw' | 'linked' | 'compressed'
	/** Frame whose cel this one shares, for linked cels */
	readonly linkedFrame: number | null
	readonly image: CelImage
}

export interface AsepriteFrame {
	/** Milliseconds */
	readonly duration: number
	/** Cels keyed by layer index */
	readonly cels: ReadonlyMap<number, AsepriteCel>
}

export interface AsepriteTag {
	readonly name: string
	readonly from: number
	readonly to: number
	readonly direction: TagDirection
	readonly repeat: number
	readonly color: Rgba
}

export interface PaletteEntry {
	readonly index: number
	readonly color: Rgba
	readonly name?: string
}

/** Cel pixel payload before color conversion */
export type CelPayload =
	| { readonly kind: 'pixels'; readonly width: number; readonly height: number; readonly samples: Uint8Array }
	| { readonly kind: 'link'; readonly frame: number }

export interface CelRecord {
	readonly layerIndex: number
	readonly x: number
	readonly y: number
	readonly opacity: number
	readonly zIndex: number
	readonly type: 'raw' | 'linked' | 'compressed'
	readonly payload: CelPayload
}

/**
 * A parsed chunk
 */
export type AsepriteChunk =
	| { readonly kind: 'palette'; readonly size: number; readonly entries: readonly PaletteEntry[] }
	| { readonly kind: 'oldPalette'; readonly entries: readonly PaletteEntry[] }
	| { readonly kind: 'layer'; readonly layer: Omit<AsepriteLayer, 'parent'> }
	| { readonly kind: 'cel'; readonly cel: CelRecord }
	| { readonly kind: 'tags'; readonly tags: readonly AsepriteTag[] }
	| { readonly kind: 'unknown'; readonly type: number }

export interface FrameOptions {
	/** Blend visible layers (default true); otherwise copy their pixels as they are */
	flatten?: boolean
}
