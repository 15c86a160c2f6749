import type { Palette } from '@pixel-codec/core'

/** CIE XYZ, Y of the D65 white point is 1 */
export type Xyz = [x: number, y: number, z: number]

/** CIE L*a*b* */
export type Lab = [l: number, a: number, b: number]

/** RGB triple, 0-255 per channel */
export type Rgb = [r: number, g: number, b: number]

/** Color difference used for nearest-color lookup */
export type DistanceMetric = 'rgb' | 'lab'

/** Palette construction algorithm */
export type QuantizeAlgorithm = 'median-cut' | 'octree' | 'popularity' | 'k-means'

/** Index assignment strategy */
export type DitherMethod = 'floyd-steinberg' | 'ordered' | 'none'

/**
 * One unique RGBA color and how many pixels use it
 */
export interface ColorCount {
	readonly r: number
	readonly g: number
	readonly b: number
	readonly a: number
	readonly count: number
	/** packRgba of the color */
	readonly key: number
}

export interface QuantizeOptions {
	/** Metric for mapping pixels onto the palette (default 'rgb') */
	distance?: DistanceMetric
}

export interface ExtractPaletteOptions {
	algorithm?: QuantizeAlgorithm
}

export interface RemapOptions {
	distance?: DistanceMetric
}

export interface QuantizeResult {
	readonly palette: Palette
	/** One palette index per pixel */
	readonly indices: Uint8Array
}

export interface DitherOptions {
	/** Alternate row direction in error diffusion (default false) */
	serpentine?: boolean
	/** Bayer matrix size for ordered dithering: 2, 4 or 8 (default 4) */
	matrixSize?: 2 | 4 | 8
	/** Ordered dither amplitude in 0-255 units (default 64) */
	spread?: number
	/** Pixels with lower alpha are treated as transparent (default 128) */
	alphaThreshold?: number
	distance?: DistanceMetric
}
