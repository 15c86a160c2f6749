import type { Rgba } from '@pixel-codec/core'
import type { ColorCount } from '../types'

const MAX_DEPTH = 8

interface OctreeNode {
	children: (OctreeNode | undefined)[]
	leaf: boolean
	pixels: number
	r: number
	g: number
	b: number
	a: number
}

function createNode(): OctreeNode {
	return { children: new Array<OctreeNode | undefined>(8).fill(undefined), leaf: false, pixels: 0, r: 0, g: 0, b: 0, a: 0 }
}

function childIndex(color: ColorCount, level: number): number {
	const shift = 7 - level
	return (((color.r >> shift) & 1) << 2) | (((color.g >> shift) & 1) << 1) | ((color.b >> shift) & 1)
}

/**
 * Octree palette: colors are inserted down to the last bit plane, then the
 * least-populated node at the deepest reducible level is folded into a leaf
 * until at most `maxColors` leaves remain.
 */
export function octree(colors: readonly ColorCount[], maxColors: number): Rgba[] {
	const root = createNode()
	// Nodes with children, per level
	const reducible: OctreeNode[][] = Array.from({ length: MAX_DEPTH }, () => [])
	let leaves = 0

	for (const color of colors) {
		let node = root
		for (let level = 0; level < MAX_DEPTH; level++) {
			const index = childIndex(color, level)
			let child = node.children[index]
			if (!child) {
				child = createNode()
				node.children[index] = child
				if (level === MAX_DEPTH - 1) {
					child.leaf = true
					leaves++
				} else {
					reducible[level + 1].push(child)
				}
			}
			node = child
		}
		node.pixels += color.count
		node.r += color.r * color.count
		node.g += color.g * color.count
		node.b += color.b * color.count
		node.a += color.a * color.count
	}
	reducible[0].push(root)

	while (leaves > maxColors) {
		let level = MAX_DEPTH - 1
		while (level > 0 && reducible[level].length === 0) level--
		const candidates = reducible[level]
		if (candidates.length === 0) break

		let pick = 0
		let least = Number.POSITIVE_INFINITY
		candidates.forEach((node, i) => {
			const pixels = node.children.reduce((sum, child) => sum + (child ? child.pixels : 0), 0)
			if (pixels < least) {
				least = pixels
				pick = i
			}
		})
		const [node] = candidates.splice(pick, 1)

		let merged = 0
		for (const child of node.children) {
			if (!child) continue
			node.pixels += child.pixels
			node.r += child.r
			node.g += child.g
			node.b += child.b
			node.a += child.a
			merged++
		}
		node.children.fill(undefined)
		node.leaf = true
		leaves -= merged - 1
	}

	const palette: Rgba[] = []
	const collect = (node: OctreeNode): void => {
		if (node.leaf) {
			palette.push([
				Math.round(node.r / node.pixels),
				Math.round(node.g / node.pixels),
				Math.round(node.b / node.pixels),
				Math.round(node.a / node.pixels),
			])
			return
		}
		for (const child of node.children) {
			if (child) collect(child)
		}
	}
	collect(root)
	return palette
}
