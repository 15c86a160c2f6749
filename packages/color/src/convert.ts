/**
 * sRGB, CIE XYZ and CIE L*a*b* conversion (D65 white point)
 */

import type { Lab, Rgb, Xyz } from './types'

const WHITE_X = 0.95047
const WHITE_Y = 1.0
const WHITE_Z = 1.08883

const EPSILON = 0.008856
const KAPPA = 903.3

function toLinear(channel: number): number {
	const c = channel / 255
	return c > 0.04045 ? ((c + 0.055) / 1.055) ** 2.4 : c / 12.92
}

function fromLinear(value: number): number {
	const c = value > 0.0031308 ? 1.055 * value ** (1 / 2.4) - 0.055 : 12.92 * value
	return Math.max(0, Math.min(255, Math.round(c * 255)))
}

/**
 * Convert sRGB to XYZ
 */
export function rgbToXyz(r: number, g: number, b: number): Xyz {
	const rn = toLinear(r)
	const gn = toLinear(g)
	const bn = toLinear(b)

	return [
		rn * 0.4124564 + gn * 0.3575761 + bn * 0.1804375,
		rn * 0.2126729 + gn * 0.7151522 + bn * 0.072175,
		rn * 0.0193339 + gn * 0.119192 + bn * 0.9503041,
	]
}

/**
 * Convert XYZ to L*a*b*
 */
export function xyzToLab(x: number, y: number, z: number): Lab {
	const f = (t: number): number => (t > EPSILON ? t ** (1 / 3) : (KAPPA * t + 16) / 116)
	const fx = f(x / WHITE_X)
	const fy = f(y / WHITE_Y)
	const fz = f(z / WHITE_Z)

	return [116 * fy - 16, 500 * (fx - fy), 200 * (fy - fz)]
}

/**
 * Convert sRGB to L*a*b*
 */
export function rgbToLab(r: number, g: number, b: number): Lab {
	return xyzToLab(...rgbToXyz(r, g, b))
}

/**
 * Convert L*a*b* to sRGB, clamped to 0-255
 */
export function labToRgb(l: number, a: number, b: number): Rgb {
	const fy = (l + 16) / 116
	const fx = a / 500 + fy
	const fz = fy - b / 200

	const inverse = (t: number): number => {
		const t3 = t ** 3
		return t3 > EPSILON ? t3 : (116 * t - 16) / KAPPA
	}
	const x = inverse(fx) * WHITE_X
	const y = inverse(fy) * WHITE_Y
	const z = inverse(fz) * WHITE_Z

	return [
		fromLinear(x * 3.2404542 + y * -1.5371385 + z * -0.4985314),
		fromLinear(x * -0.969266 + y * 1.8760108 + z * 0.041556),
		fromLinear(x * 0.0556434 + y * -0.2040259 + z * 1.0572252),
	]
}
