import type { Rgba } from '@pixel-codec/core'
import { weightedMean } from '../histogram'
import type { ColorCount } from '../types'

type Channel = 'r' | 'g' | 'b'

interface Box {
	readonly colors: ColorCount[]
	readonly pixels: number
	readonly channel: Channel
	readonly range: number
}

function makeBox(colors: ColorCount[]): Box {
	let rMin = 255
	let rMax = 0
	let gMin = 255
	let gMax = 0
	let bMin = 255
	let bMax = 0
	let pixels = 0

	for (const c of colors) {
		rMin = Math.min(rMin, c.r)
		rMax = Math.max(rMax, c.r)
		gMin = Math.min(gMin, c.g)
		gMax = Math.max(gMax, c.g)
		bMin = Math.min(bMin, c.b)
		bMax = Math.max(bMax, c.b)
		pixels += c.count
	}

	const rRange = rMax - rMin
	const gRange = gMax - gMin
	const bRange = bMax - bMin
	if (rRange >= gRange && rRange >= bRange) return { colors, pixels, channel: 'r', range: rRange }
	if (gRange >= bRange) return { colors, pixels, channel: 'g', range: gRange }
	return { colors, pixels, channel: 'b', range: bRange }
}

/**
 * Split a box at the frequency-weighted median of its widest channel
 */
function split(box: Box): [Box, Box] {
	const { channel } = box
	const sorted = [...box.colors].sort((a, b) => a[channel] - b[channel] || a.key - b.key)

	const half = box.pixels / 2
	let seen = 0
	let at = 1
	for (let i = 0; i < sorted.length - 1; i++) {
		seen += sorted[i].count
		at = i + 1
		if (seen >= half) break
	}
	return [makeBox(sorted.slice(0, at)), makeBox(sorted.slice(at))]
}

/**
 * Median-cut palette. Boxes wait in a work queue; each step splits the one
 * with the largest channel range times pixel count.
 */
export function medianCut(colors: readonly ColorCount[], maxColors: number): Rgba[] {
	const queue: Box[] = [makeBox([...colors])]

	while (queue.length < maxColors) {
		let pick = -1
		let bestScore = 0
		for (let i = 0; i < queue.length; i++) {
			const box = queue[i]
			if (box.colors.length < 2 || box.range === 0) continue
			const score = box.range * box.pixels
			if (score > bestScore) {
				bestScore = score
				pick = i
			}
		}
		if (pick < 0) break

		queue.splice(pick, 1, ...split(queue[pick]))
	}

	return queue.map((box) => weightedMean(box.colors))
}
