import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ByteWriter } from '@pixel-codec/core'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
	type PixelBuffer,
	decodeIndexedAnimation,
	decodeRaster,
	loadLayeredSpriteFile,
	packAtlas,
	saveAtlas,
	saveIndexedAnimation,
	saveRaster,
	writeFileAtomic,
} from '../src'

function solid(width: number, height: number, color: number[]): PixelBuffer {
	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < width * height; i++) data.set(color, i * 4)
	return { width, height, data }
}

/** One-frame RGBA sprite with a single 1x1 layer */
function tinySprite(color: number[]): Uint8Array {
	const layerName = 'Layer 1'
	const layer = new ByteWriter()
		.u16le(1)
		.u16le(0)
		.u16le(0)
		.u16le(0)
		.u16le(0)
		.u16le(0)
		.u8(255)
		.bytes(new Uint8Array(3))
		.u16le(layerName.length)
		.ascii(layerName)
		.toBytes()
	const cel = new ByteWriter()
		.u16le(0)
		.u16le(0)
		.u16le(0)
		.u8(255)
		.u16le(0)
		.u16le(0)
		.bytes(new Uint8Array(5))
		.u16le(1)
		.u16le(1)
		.bytes(Uint8Array.from(color))
		.toBytes()
	const chunks = [
		new ByteWriter().u32le(layer.length + 6).u16le(0x2004).bytes(layer).toBytes(),
		new ByteWriter().u32le(cel.length + 6).u16le(0x2005).bytes(cel).toBytes(),
	]
	const frameSize = 16 + chunks[0].length + chunks[1].length
	const w = new ByteWriter()
		.u32le(128 + frameSize)
		.u16le(0xa5e0)
		.u16le(1)
		.u16le(1)
		.u16le(1)
		.u16le(32)
		.u32le(1)
		.u16le(100)
		.bytes(new Uint8Array(8))
		.u8(0)
		.bytes(new Uint8Array(3))
		.u16le(0)
		.u8(1)
		.u8(1)
		.bytes(new Uint8Array(92))
	w.u32le(frameSize).u16le(0xf1fa).u16le(2).u16le(120).u16le(0).u32le(2)
	for (const chunk of chunks) w.bytes(chunk)
	return w.toBytes()
}

describe('file output', () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'pixelcodec-'))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	describe('writeFileAtomic', () => {
		it('replaces the target and leaves no temp file', async () => {
			const target = join(dir, 'out.bin')
			await writeFile(target, 'old')
			await writeFileAtomic(target, new Uint8Array([1, 2, 3]))
			expect(new Uint8Array(await readFile(target))).toEqual(new Uint8Array([1, 2, 3]))
			expect(await readdir(dir)).toEqual(['out.bin'])
		})

		it('cleans up and rethrows when the rename fails', async () => {
			const target = join(dir, 'taken')
			await mkdir(target)
			await expect(writeFileAtomic(target, new Uint8Array([1]))).rejects.toThrow()
			expect(await readdir(dir)).toEqual(['taken'])
		})

		it('rejects when the directory does not exist', async () => {
			await expect(writeFileAtomic(join(dir, 'missing', 'out.bin'), new Uint8Array([1]))).rejects.toThrow()
			expect(await readdir(dir)).toEqual([])
		})
	})

	it('saves a decodable raster', async () => {
		const image = solid(3, 2, [10, 20, 30, 255])
		const path = join(dir, 'image.png')
		await saveRaster(path, image)
		expect(decodeRaster(new Uint8Array(await readFile(path)))).toEqual(image)
	})

	it('saves an indexed animation', async () => {
		const path = join(dir, 'walk.gif')
		await saveIndexedAnimation(path, [
			{ image: solid(2, 2, [255, 0, 0, 255]), delay: 100 },
			{ image: solid(2, 2, [0, 0, 255, 255]), delay: 200 },
		])
		const decoded = decodeIndexedAnimation(new Uint8Array(await readFile(path)))
		expect(decoded.frames.map((f) => f.delay)).toEqual([100, 200])
	})

	describe('saveAtlas', () => {
		it('writes one page and its metadata', async () => {
			const atlas = packAtlas([{ id: 'hero', image: solid(4, 4, [1, 2, 3, 255]) }], { maxWidth: 8, maxHeight: 8 })
			const base = join(dir, 'atlas')
			expect(await saveAtlas(base, atlas)).toEqual([`${base}.png`, `${base}.json`])

			const json: unknown = JSON.parse(await readFile(`${base}.json`, 'utf8'))
			expect(json).toEqual({
				pages: [{ index: 0, width: 4, height: 4, sprites: 1, image: 'atlas.png' }],
				sprites: {
					hero: {
						page: 0,
						x: 0,
						y: 0,
						width: 4,
						height: 4,
						rotated: false,
						trimmed: false,
						trimX: 0,
						trimY: 0,
						sourceWidth: 4,
						sourceHeight: 4,
					},
				},
			})
			expect(decodeRaster(new Uint8Array(await readFile(`${base}.png`)))).toEqual(atlas.pages[0])
		})

		it('numbers pages when there are several', async () => {
			const atlas = packAtlas([solid(4, 4, [1, 1, 1, 255]), solid(4, 4, [2, 2, 2, 255])], {
				maxWidth: 4,
				maxHeight: 4,
			})
			const base = join(dir, 'sheet')
			expect(await saveAtlas(base, atlas)).toEqual([`${base}_0.png`, `${base}_1.png`, `${base}.json`])
		})
	})

	it('loads a layered sprite file', async () => {
		const path = join(dir, 'tiny.aseprite')
		await writeFile(path, tinySprite([9, 8, 7, 255]))
		const sprite = await loadLayeredSpriteFile(path)
		expect(sprite.layerNames).toEqual(['Layer 1'])
		expect(sprite.frameDurations).toEqual([120])
		expect(Array.from(sprite.getFrame(0).data)).toEqual([9, 8, 7, 255])
	})
})
