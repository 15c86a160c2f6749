/**
 * Blend formulas on unit-range channels, as in the W3C compositing model
 */

import type { BlendMode, NonSeparableMode, SeparableMode } from './types'

type Rgb = [r: number, g: number, b: number]

const multiply = (b: number, s: number): number => b * s
const screen = (b: number, s: number): number => b + s - b * s
const hardLight = (b: number, s: number): number => (s <= 0.5 ? multiply(b, 2 * s) : screen(b, 2 * s - 1))

const SEPARABLE: Readonly<Record<SeparableMode, (backdrop: number, source: number) => number>> = Object.freeze({
	normal: (_b, s) => s,
	multiply,
	screen,
	overlay: (b, s) => hardLight(s, b),
	darken: Math.min,
	lighten: Math.max,
	colorDodge: (b, s) => {
		if (b === 0) return 0
		return s >= 1 ? 1 : Math.min(1, b / (1 - s))
	},
	colorBurn: (b, s) => {
		if (b >= 1) return 1
		return s <= 0 ? 0 : 1 - Math.min(1, (1 - b) / s)
	},
	hardLight,
	softLight: (b, s) => {
		if (s <= 0.5) return b - (1 - 2 * s) * b * (1 - b)
		const d = b <= 0.25 ? ((16 * b - 12) * b + 4) * b : Math.sqrt(b)
		return b + (2 * s - 1) * (d - b)
	},
	difference: (b, s) => Math.abs(b - s),
	exclusion: (b, s) => b + s - 2 * b * s,
	addition: (b, s) => Math.min(1, b + s),
	subtract: (b, s) => Math.max(0, b - s),
	divide: (b, s) => {
		if (b === 0) return 0
		return b >= s ? 1 : b / s
	},
})

function lum([r, g, b]: Rgb): number {
	return 0.3 * r + 0.59 * g + 0.11 * b
}

function sat(c: Rgb): number {
	return Math.max(...c) - Math.min(...c)
}

function clipColor(c: Rgb): Rgb {
	const l = lum(c)
	const n = Math.min(...c)
	const x = Math.max(...c)
	const clip = (v: number): number => {
		let out = v
		if (n < 0) out = l + ((out - l) * l) / (l - n)
		if (x > 1) out = l + ((out - l) * (1 - l)) / (x - l)
		return out
	}
	return [clip(c[0]), clip(c[1]), clip(c[2])]
}

function setLum(c: Rgb, l: number): Rgb {
	const d = l - lum(c)
	return clipColor([c[0] + d, c[1] + d, c[2] + d])
}

function setSat(c: Rgb, s: number): Rgb {
	const max = Math.max(...c)
	const min = Math.min(...c)
	if (max === min) return [0, 0, 0]
	return [((c[0] - min) * s) / (max - min), ((c[1] - min) * s) / (max - min), ((c[2] - min) * s) / (max - min)]
}

const NON_SEPARABLE: Readonly<Record<NonSeparableMode, (backdrop: Rgb, source: Rgb) => Rgb>> = Object.freeze({
	hue: (b, s) => setLum(setSat(s, sat(b)), lum(b)),
	saturation: (b, s) => setLum(setSat(b, sat(s)), lum(b)),
	color: (b, s) => setLum(s, lum(b)),
	luminosity: (b, s) => setLum(b, lum(s)),
})

export function isNonSeparable(mode: BlendMode): mode is NonSeparableMode {
	return mode === 'hue' || mode === 'saturation' || mode === 'color' || mode === 'luminosity'
}

/**
 * Blend a source color over a backdrop color, channels 0-255 in and out
 * (unrounded). Alpha is handled by the caller.
 */
export function blendColor(
	mode: BlendMode,
	backdrop: readonly [number, number, number],
	source: readonly [number, number, number]
): Rgb {
	const b: Rgb = [backdrop[0] / 255, backdrop[1] / 255, backdrop[2] / 255]
	const s: Rgb = [source[0] / 255, source[1] / 255, source[2] / 255]
	let out: Rgb
	if (isNonSeparable(mode)) {
		out = NON_SEPARABLE[mode](b, s)
	} else {
		const fn = SEPARABLE[mode]
		out = [fn(b[0], s[0]), fn(b[1], s[1]), fn(b[2], s[2])]
	}
	return [out[0] * 255, out[1] * 255, out[2] * 255]
}
