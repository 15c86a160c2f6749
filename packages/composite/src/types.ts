import type { PixelBuffer } from '@pixel-codec/core'

/**
 * Blend modes in layered sprite file order (the position is the stored id)
 */
export const BLEND_MODES = [
	'normal',
	'multiply',
	'screen',
	'overlay',
	'darken',
	'lighten',
	'colorDodge',
	'colorBurn',
	'hardLight',
	'softLight',
	'difference',
	'exclusion',
	'hue',
	'saturation',
	'color',
	'luminosity',
	'addition',
	'subtract',
	'divide',
] as const

export type BlendMode = (typeof BLEND_MODES)[number]

/** Modes that mix whole colors rather than single channels */
export type NonSeparableMode = 'hue' | 'saturation' | 'color' | 'luminosity'

export type SeparableMode = Exclude<BlendMode, NonSeparableMode>

/**
 * An image placed on a canvas
 */
export interface Layer {
	image: PixelBuffer
	x?: number
	y?: number
	blendMode?: BlendMode
	/** 0-1, multiplied into the pixel alpha */
	opacity?: number
	visible?: boolean
}
