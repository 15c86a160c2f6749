import type { Rgba } from '@pixel-codec/core'
import type { ColorCount } from '../types'

const MAX_ITERATIONS = 16
/** Largest squared centroid shift that counts as converged */
const CONVERGENCE_EPSILON = 0.5

interface Centroid {
	r: number
	g: number
	b: number
	a: number
}

function distance(c: ColorCount, centroid: Centroid): number {
	return (c.r - centroid.r) ** 2 + (c.g - centroid.g) ** 2 + (c.b - centroid.b) ** 2
}

/**
 * Farthest-point seeds over colors sorted by value. The most frequent
 * color seeds first; each next seed is the color farthest from all seeds.
 */
function seed(sorted: readonly ColorCount[], k: number): Centroid[] {
	let first = sorted[0]
	for (const color of sorted) {
		if (color.count > first.count) first = color
	}

	const centroids: Centroid[] = [{ r: first.r, g: first.g, b: first.b, a: first.a }]
	const nearest = sorted.map((color) => distance(color, centroids[0]))

	while (centroids.length < k) {
		let pick = -1
		let farthest = 0
		nearest.forEach((d, i) => {
			if (d > farthest) {
				farthest = d
				pick = i
			}
		})
		if (pick < 0) break

		const color = sorted[pick]
		const centroid = { r: color.r, g: color.g, b: color.b, a: color.a }
		centroids.push(centroid)
		sorted.forEach((c, i) => {
			nearest[i] = Math.min(nearest[i], distance(c, centroid))
		})
	}
	return centroids
}

/**
 * Centroid refinement: weighted Lloyd iterations from deterministic seeds
 */
export function kMeans(colors: readonly ColorCount[], maxColors: number): Rgba[] {
	const sorted = [...colors].sort((a, b) => a.key - b.key)
	const centroids = seed(sorted, maxColors)
	const assignment = new Int32Array(sorted.length)

	for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
		sorted.forEach((color, i) => {
			let best = 0
			let bestDistance = Number.POSITIVE_INFINITY
			centroids.forEach((centroid, j) => {
				const d = distance(color, centroid)
				if (d < bestDistance) {
					bestDistance = d
					best = j
				}
			})
			assignment[i] = best
		})

		const sums = centroids.map(() => ({ r: 0, g: 0, b: 0, a: 0, pixels: 0 }))
		sorted.forEach((color, i) => {
			const sum = sums[assignment[i]]
			sum.r += color.r * color.count
			sum.g += color.g * color.count
			sum.b += color.b * color.count
			sum.a += color.a * color.count
			sum.pixels += color.count
		})

		let shift = 0
		sums.forEach((sum, j) => {
			// An empty cluster keeps its centroid
			if (sum.pixels === 0) return
			const centroid = centroids[j]
			const next = { r: sum.r / sum.pixels, g: sum.g / sum.pixels, b: sum.b / sum.pixels, a: sum.a / sum.pixels }
			shift = Math.max(shift, (next.r - centroid.r) ** 2 + (next.g - centroid.g) ** 2 + (next.b - centroid.b) ** 2)
			centroids[j] = next
		})
		if (shift < CONVERGENCE_EPSILON) break
	}

	return centroids.map((c) => [Math.round(c.r), Math.round(c.g), Math.round(c.b), Math.round(c.a)])
}
