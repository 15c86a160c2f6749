/**
 * Image compositing operations
 */

import type { PixelBuffer, Rect } from '@pixel-codec/core'
import { blendColor } from './blend'
import type { Layer } from './types'

/**
 * Paint a layer onto the canvas in place. The blend result is weighted by
 * the backdrop alpha, then composited source-over.
 */
export function drawLayer(canvas: PixelBuffer, layer: Layer): void {
	if (layer.visible === false) return
	const { image, x = 0, y = 0, blendMode = 'normal', opacity = 1 } = layer
	const out = canvas.data
	const src = image.data

	for (let row = 0; row < image.height; row++) {
		const cy = y + row
		if (cy < 0 || cy >= canvas.height) continue
		for (let col = 0; col < image.width; col++) {
			const cx = x + col
			if (cx < 0 || cx >= canvas.width) continue

			const s = (row * image.width + col) * 4
			const alphaS = (src[s + 3] / 255) * opacity
			if (alphaS === 0) continue

			const d = (cy * canvas.width + cx) * 4
			const alphaB = out[d + 3] / 255
			const source: [number, number, number] = [src[s], src[s + 1], src[s + 2]]
			const mixed =
				alphaB === 0 ? source : blendColor(blendMode, [out[d], out[d + 1], out[d + 2]], source)

			const alphaO = alphaS + alphaB * (1 - alphaS)
			for (let c = 0; c < 3; c++) {
				const blended = (1 - alphaB) * source[c] + alphaB * mixed[c]
				out[d + c] = Math.round((alphaS * blended + alphaB * out[d + c] * (1 - alphaS)) / alphaO)
			}
			out[d + 3] = Math.round(alphaO * 255)
		}
	}
}

/**
 * Flatten layers, bottom first, onto a transparent canvas
 */
export function flattenLayers(layers: readonly Layer[], width: number, height: number): PixelBuffer {
	const canvas: PixelBuffer = { width, height, data: new Uint8Array(width * height * 4) }
	for (const layer of layers) drawLayer(canvas, layer)
	return canvas
}

/**
 * Draw `image` over the canvas at (x, y) in place
 */
export function compositeOver(canvas: PixelBuffer, image: PixelBuffer, x = 0, y = 0): void {
	drawLayer(canvas, { image, x, y })
}

/**
 * Overwrite the canvas region at (x, y) with `image`, alpha included
 */
export function replaceRegion(canvas: PixelBuffer, image: PixelBuffer, x = 0, y = 0): void {
	const x0 = Math.max(0, x)
	const x1 = Math.min(canvas.width, x + image.width)
	if (x1 <= x0) return

	for (let row = 0; row < image.height; row++) {
		const destY = y + row
		if (destY < 0 || destY >= canvas.height) continue
		const src = (row * image.width + (x0 - x)) * 4
		canvas.data.set(image.data.subarray(src, src + (x1 - x0) * 4), (destY * canvas.width + x0) * 4)
	}
}

/**
 * Reset a canvas region to transparent black
 */
export function clearRegion(canvas: PixelBuffer, rect: Rect): void {
	const x0 = Math.max(0, rect.x)
	const x1 = Math.min(canvas.width, rect.x + rect.width)
	const y0 = Math.max(0, rect.y)
	const y1 = Math.min(canvas.height, rect.y + rect.height)
	for (let y = y0; y < y1; y++) {
		canvas.data.fill(0, (y * canvas.width + x0) * 4, (y * canvas.width + x1) * 4)
	}
}

/**
 * Copy a canvas region into a new buffer
 */
export function extractRegion(canvas: PixelBuffer, rect: Rect): PixelBuffer {
	const out: PixelBuffer = { width: rect.width, height: rect.height, data: new Uint8Array(rect.width * rect.height * 4) }
	replaceRegion(out, canvas, -rect.x, -rect.y)
	return out
}
