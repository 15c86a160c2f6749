import { InvalidInputError } from '@pixel-codec/core'
import type { FreeRectList } from './free-rects'
import {
	type PackedSource,
	type ResolvedPackOptions,
	assertFitsPage,
	layoutAtlas,
	placeOnPages,
	prepareSource,
	renderPages,
	resolvePackOptions,
	toNamedSource,
} from './pack'
import type { AtlasPlacement, AtlasResult, AtlasSource, PackOptions } from './types'

export interface AddResult {
	readonly entry: AtlasPlacement
	/** Whether earlier sprites moved */
	readonly repacked: boolean
}

function samePosition(a: AtlasPlacement, b: AtlasPlacement): boolean {
	return a.page === b.page && a.x === b.x && a.y === b.y && a.rotated === b.rotated
}

/**
 * Atlas that grows one sprite at a time. A new sprite goes into the current
 * free space when it fits; otherwise everything is packed again from scratch.
 */
export class AtlasBuilder {
	private readonly options: ResolvedPackOptions
	private readonly sources: PackedSource[] = []
	private pages: FreeRectList[] = []
	private placements: AtlasPlacement[] = []

	constructor(options: PackOptions) {
		this.options = resolvePackOptions(options)
	}

	get size(): number {
		return this.sources.length
	}

	get pageCount(): number {
		return this.pages.length
	}

	add(source: AtlasSource): AddResult {
		const named = toNamedSource(source, this.sources.length)
		if (this.sources.some((s) => s.id === named.id)) {
			throw new InvalidInputError(`Duplicate sprite id ${named.id}`)
		}
		const packed = prepareSource(named, this.options.trim)
		assertFitsPage(packed, this.options)

		const placed = placeOnPages(this.pages, packed, this.options, this.pages.length === 0)
		this.sources.push(packed)
		if (placed) {
			this.placements.push(placed)
			return { entry: placed, repacked: false }
		}

		const previous = this.placements
		const layout = layoutAtlas(this.sources, this.options)
		this.pages = layout.pages
		this.placements = layout.placements
		return {
			entry: layout.placements[layout.placements.length - 1],
			repacked: previous.some((before, index) => !samePosition(before, layout.placements[index])),
		}
	}

	build(): AtlasResult {
		return {
			pages: renderPages(this.pages.length, this.sources, this.placements, this.options.padding),
			placements: [...this.placements],
		}
	}
}
