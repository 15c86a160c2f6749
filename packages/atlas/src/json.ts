import type { AtlasJson, AtlasJsonPage, AtlasResult } from './types'

/**
 * Plain JSON metadata for a packed atlas, sprites keyed by id
 */
export function toAtlasJson(result: AtlasResult, imageNames: readonly string[] = []): AtlasJson {
	const pages: AtlasJsonPage[] = result.pages.map((page, index) => {
		const sprites = result.placements.filter((p) => p.page === index).length
		const entry: AtlasJsonPage = { index, width: page.width, height: page.height, sprites }
		if (index < imageNames.length) entry.image = imageNames[index]
		return entry
	})

	const sprites: AtlasJson['sprites'] = {}
	for (const { id, ...sprite } of result.placements) {
		sprites[id] = sprite
	}
	return { pages, sprites }
}
