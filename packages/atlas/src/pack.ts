import {
	InvalidInputError,
	PackingError,
	type PixelBuffer,
	type Rect,
	assertPixelBuffer,
	createPixelBuffer,
	parseOptions,
} from '@pixel-codec/core'
import { z } from 'zod'
import { FreeRectList } from './free-rects'
import type { AtlasPlacement, AtlasResult, AtlasSource, NamedSource, PackOptions } from './types'

const optionsSchema = z.object({
	maxWidth: z.number().int().min(1),
	maxHeight: z.number().int().min(1),
	allowRotation: z.boolean().default(false),
	padding: z.number().int().min(0).default(0),
	trim: z.boolean().default(true),
})

export type ResolvedPackOptions = z.output<typeof optionsSchema>

/**
 * Source as packed: cropped to its content when trimming is on
 */
export interface PackedSource extends NamedSource {
	readonly trimX: number
	readonly trimY: number
	readonly sourceWidth: number
	readonly sourceHeight: number
}

export interface AtlasLayout {
	readonly pages: FreeRectList[]
	/** In source order */
	readonly placements: AtlasPlacement[]
}

export function resolvePackOptions(options: PackOptions): ResolvedPackOptions {
	return parseOptions(optionsSchema, options, 'atlas')
}

/**
 * Validate a source and give plain buffers their position as id
 */
export function toNamedSource(source: AtlasSource, index: number): NamedSource {
	const named = 'image' in source ? source : { id: String(index), image: source }
	assertPixelBuffer(named.image, `Sprite ${named.id}`)
	return named
}

/**
 * Bounding box of pixels with nonzero alpha, null when there are none
 */
export function contentBounds(image: PixelBuffer): Rect | null {
	const { width, height, data } = image
	let left = width
	let top = height
	let right = -1
	let bottom = -1
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			if (data[(y * width + x) * 4 + 3] === 0) continue
			left = Math.min(left, x)
			right = Math.max(right, x)
			top = Math.min(top, y)
			bottom = Math.max(bottom, y)
		}
	}
	if (right < 0) return null
	return { x: left, y: top, width: right - left + 1, height: bottom - top + 1 }
}

function crop(image: PixelBuffer, rect: Rect): PixelBuffer {
	const out = createPixelBuffer(rect.width, rect.height)
	for (let y = 0; y < rect.height; y++) {
		const src = ((rect.y + y) * image.width + rect.x) * 4
		out.data.set(image.data.subarray(src, src + rect.width * 4), y * rect.width * 4)
	}
	return out
}

/**
 * Crop transparent borders; an empty image shrinks to its top-left pixel
 */
export function prepareSource(source: NamedSource, trim: boolean): PackedSource {
	const { id, image } = source
	const { width, height } = image
	const bounds = trim ? (contentBounds(image) ?? { x: 0, y: 0, width: 1, height: 1 }) : null
	if (!bounds || (bounds.width === width && bounds.height === height)) {
		return { id, image, trimX: 0, trimY: 0, sourceWidth: width, sourceHeight: height }
	}
	return { id, image: crop(image, bounds), trimX: bounds.x, trimY: bounds.y, sourceWidth: width, sourceHeight: height }
}

function normalizeSources(sources: readonly AtlasSource[], trim: boolean): PackedSource[] {
	const named = sources.map(toNamedSource)
	const seen = new Set<string>()
	for (const { id } of named) {
		if (seen.has(id)) throw new InvalidInputError(`Duplicate sprite id ${id}`)
		seen.add(id)
	}
	return named.map((source) => prepareSource(source, trim))
}

/**
 * Throw when a sprite cannot fit an empty page in any allowed orientation
 */
export function assertFitsPage(source: NamedSource, options: ResolvedPackOptions): void {
	const { maxWidth, maxHeight, padding, allowRotation } = options
	const width = source.image.width + padding * 2
	const height = source.image.height + padding * 2
	const fits =
		(width <= maxWidth && height <= maxHeight) || (allowRotation && height <= maxWidth && width <= maxHeight)
	if (!fits) {
		throw new PackingError(
			`Sprite ${source.id} (${source.image.width}x${source.image.height}) does not fit a ${maxWidth}x${maxHeight} page`,
			{ metadata: { id: source.id, padding } }
		)
	}
}

/**
 * Place a sprite on the first page with room, optionally opening a new page
 */
export function placeOnPages(
	pages: FreeRectList[],
	source: PackedSource,
	options: ResolvedPackOptions,
	openPage: boolean
): AtlasPlacement | null {
	const { padding, allowRotation } = options
	const width = source.image.width + padding * 2
	const height = source.image.height + padding * 2

	for (let page = 0; page <= pages.length; page++) {
		if (page === pages.length) {
			if (!openPage) return null
			pages.push(new FreeRectList(options.maxWidth, options.maxHeight))
		}
		const free = pages[page]
		const fit = free.findFit(width, height, allowRotation)
		if (!fit) continue
		free.place(fit)
		return {
			id: source.id,
			page,
			x: fit.x + padding,
			y: fit.y + padding,
			width: fit.width - padding * 2,
			height: fit.height - padding * 2,
			rotated: fit.rotated,
			trimmed: source.image.width !== source.sourceWidth || source.image.height !== source.sourceHeight,
			trimX: source.trimX,
			trimY: source.trimY,
			sourceWidth: source.sourceWidth,
			sourceHeight: source.sourceHeight,
		}
	}
	return null
}

/**
 * Packing order: height descending, width descending, input order
 */
export function packOrder(sources: readonly NamedSource[]): number[] {
	return sources
		.map((_, index) => index)
		.sort((a, b) => {
			const sa = sources[a].image
			const sb = sources[b].image
			return sb.height - sa.height || sb.width - sa.width || a - b
		})
}

export function layoutAtlas(sources: readonly PackedSource[], options: ResolvedPackOptions): AtlasLayout {
	for (const source of sources) assertFitsPage(source, options)

	const pages: FreeRectList[] = []
	const placements = new Array<AtlasPlacement>(sources.length)
	for (const index of packOrder(sources)) {
		const placement = placeOnPages(pages, sources[index], options, true)
		// A fresh page always fits after assertFitsPage
		if (!placement) throw new PackingError(`Sprite ${sources[index].id} could not be placed`)
		placements[index] = placement
	}
	return { pages, placements }
}

function copySprite(page: PixelBuffer, image: PixelBuffer, placement: AtlasPlacement): void {
	const { width, height, data } = image
	if (!placement.rotated) {
		for (let y = 0; y < height; y++) {
			const src = y * width * 4
			page.data.set(data.subarray(src, src + width * 4), ((placement.y + y) * page.width + placement.x) * 4)
		}
		return
	}
	// 90° clockwise: source (x, y) lands at (height - 1 - y, x)
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const src = (y * width + x) * 4
			const dst = ((placement.y + x) * page.width + placement.x + height - 1 - y) * 4
			page.data.set(data.subarray(src, src + 4), dst)
		}
	}
}

/**
 * Draw sprites onto pages cropped to the used area (padding included)
 */
export function renderPages(
	pageCount: number,
	sources: readonly NamedSource[],
	placements: readonly AtlasPlacement[],
	padding: number
): PixelBuffer[] {
	const extents = Array.from({ length: pageCount }, () => ({ width: 1, height: 1 }))
	for (const placement of placements) {
		const extent = extents[placement.page]
		extent.width = Math.max(extent.width, placement.x + placement.width + padding)
		extent.height = Math.max(extent.height, placement.y + placement.height + padding)
	}

	const pages = extents.map(({ width, height }) => createPixelBuffer(width, height))
	placements.forEach((placement, index) => {
		copySprite(pages[placement.page], sources[index].image, placement)
	})
	return pages
}

/**
 * Pack images into as few pages as the free-rectangle heuristic manages.
 * Deterministic: the same input always yields the same layout.
 */
export function packAtlas(sources: readonly AtlasSource[], options: PackOptions): AtlasResult {
	const resolved = resolvePackOptions(options)
	const named = normalizeSources(sources, resolved.trim)
	const { pages, placements } = layoutAtlas(named, resolved)
	return {
		pages: renderPages(pages.length, named, placements, resolved.padding),
		placements,
	}
}
