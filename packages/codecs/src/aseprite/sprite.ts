import { drawLayer } from '@pixel-codec/composite'
import { type Palette, type PixelBuffer, createPixelBuffer } from '@pixel-codec/core'
import { type AsepriteCel, type AsepriteFrame, type AsepriteHeader, type AsepriteLayer, type AsepriteTag, type FrameOptions, LayerType } from './types'

/**
 * Copy pixels with non-zero alpha onto the canvas, no blending
 */
function blit(canvas: PixelBuffer, cel: AsepriteCel): void {
	const { image } = cel
	for (let row = 0; row < image.height; row++) {
		const y = cel.y + row
		if (y < 0 || y >= canvas.height) continue
		for (let col = 0; col < image.width; col++) {
			const x = cel.x + col
			if (x < 0 || x >= canvas.width) continue
			const src = (row * image.width + col) * 4
			if (image.data[src + 3] === 0) continue
			canvas.data.set(image.data.subarray(src, src + 4), (y * canvas.width + x) * 4)
		}
	}
}

/**
 * Frame indices of a tag in playback order
 */
export function tagFrameOrder(tag: Pick<AsepriteTag, 'from' | 'to' | 'direction'>): number[] {
	const forward: number[] = []
	for (let i = tag.from; i <= tag.to; i++) forward.push(i)
	const backward = [...forward].reverse()

	switch (tag.direction) {
		case 'forward':
			return forward
		case 'reverse':
			return backward
		// The turning frames are not repeated
		case 'ping-pong':
			return [...forward, ...backward.slice(1, -1)]
		case 'ping-pong-reverse':
			return [...backward, ...forward.slice(1, -1)]
	}
}

/**
 * A decoded Aseprite document
 */
export class AsepriteSprite {
	readonly width: number
	readonly height: number

	constructor(
		readonly header: AsepriteHeader,
		readonly layers: readonly AsepriteLayer[],
		readonly frames: readonly AsepriteFrame[],
		readonly tags: readonly AsepriteTag[],
		readonly palette: Palette,
		readonly paletteNames: ReadonlyMap<number, string>
	) {
		this.width = header.width
		this.height = header.height
	}

	get frameDurations(): number[] {
		return this.frames.map((frame) => frame.duration)
	}

	get layerNames(): string[] {
		return this.layers.map((layer) => layer.name)
	}

	get tagNames(): string[] {
		return this.tags.map((tag) => tag.name)
	}

	/**
	 * A layer is shown when it and every enclosing group are visible
	 */
	isLayerVisible(index: number): boolean {
		for (let i: number | null = index; i !== null; i = this.layers[i].parent) {
			if (!this.layers[i].visible) return false
		}
		return true
	}

	/**
	 * Render one frame. Flattening blends visible layers bottom-up with the
	 * layer blend mode and cel times layer opacity.
	 */
	getFrame(index: number, options: FrameOptions = {}): PixelBuffer {
		if (!Number.isInteger(index) || index < 0 || index >= this.frames.length) {
			throw new RangeError(`Frame ${index} out of range (0..${this.frames.length - 1})`)
		}
		const { flatten = true } = options
		const frame = this.frames[index]
		const canvas = createPixelBuffer(this.width, this.height)

		this.layers.forEach((layer, layerIndex) => {
			if (layer.type === LayerType.Group || !this.isLayerVisible(layerIndex)) return
			const cel = frame.cels.get(layerIndex)
			if (!cel) return

			if (flatten) {
				drawLayer(canvas, {
					image: cel.image,
					x: cel.x,
					y: cel.y,
					blendMode: layer.blendMode,
					opacity: (cel.opacity / 255) * (layer.opacity / 255),
				})
			} else {
				blit(canvas, cel)
			}
		})
		return canvas
	}

	/**
	 * Flattened frames, all of them or those of a tag in playback order.
	 * An unknown tag yields no frames.
	 */
	getAnimation(tagName?: string): PixelBuffer[] {
		if (tagName === undefined) {
			return this.frames.map((_, i) => this.getFrame(i))
		}
		const tag = this.tags.find((t) => t.name === tagName)
		if (!tag) return []
		return tagFrameOrder(tag).map((i) => this.getFrame(i))
	}

	/**
	 * Every frame of a single layer, pixels copied as stored
	 */
	getLayer(name: string): PixelBuffer[] {
		const layerIndex = this.layers.findIndex((layer) => layer.name === name)
		if (layerIndex < 0) return []
		return this.frames.map((frame) => {
			const canvas = createPixelBuffer(this.width, this.height)
			const cel = frame.cels.get(layerIndex)
			if (cel) blit(canvas, cel)
			return canvas
		})
	}
}
