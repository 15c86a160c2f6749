import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { type AtlasResult, toAtlasJson } from '@pixel-codec/atlas'
import {
	type ApngAnimation,
	type ApngEncodeOptions,
	type AsepriteSprite,
	type GifEncodeOptions,
	type GifFrameInput,
	type PngEncodeOptions,
	decodeAseprite,
	encodeApng,
	encodeGif,
	encodePng,
} from '@pixel-codec/codecs'
import type { PixelBuffer } from '@pixel-codec/core'
import { writeFileAtomic } from './io'
import { createChildLogger } from './logger'

const log = createChildLogger({ module: 'files' })

export async function saveRaster(path: string, image: PixelBuffer, options: PngEncodeOptions = {}): Promise<void> {
	await writeFileAtomic(path, encodePng(image, options))
}

export async function saveAnimatedRaster(
	path: string,
	animation: ApngAnimation,
	options: ApngEncodeOptions = {}
): Promise<void> {
	await writeFileAtomic(path, encodeApng(animation, options))
}

export async function saveIndexedAnimation(
	path: string,
	frames: readonly GifFrameInput[],
	options: GifEncodeOptions = {}
): Promise<void> {
	await writeFileAtomic(path, encodeGif(frames, options))
}

/**
 * Write atlas pages as `<base>.png` (or `<base>_<n>.png` for several pages)
 * and the metadata as `<base>.json`. Returns the written paths.
 */
export async function saveAtlas(basePath: string, atlas: AtlasResult): Promise<string[]> {
	const pagePaths = atlas.pages.map((_, i) => (atlas.pages.length > 1 ? `${basePath}_${i}.png` : `${basePath}.png`))
	for (const [i, page] of atlas.pages.entries()) {
		await writeFileAtomic(pagePaths[i], encodePng(page))
	}

	const imageNames = pagePaths.map((path) => basename(path))
	const json = JSON.stringify(toAtlasJson(atlas, imageNames), null, 2)
	const jsonPath = `${basePath}.json`
	await writeFileAtomic(jsonPath, new TextEncoder().encode(json))
	log.info({ pages: pagePaths.length, sprites: atlas.placements.length }, 'saved atlas')
	return [...pagePaths, jsonPath]
}

export async function loadLayeredSpriteFile(path: string): Promise<AsepriteSprite> {
	return decodeAseprite(new Uint8Array(await readFile(path)))
}
