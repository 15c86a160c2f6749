import type { Rect } from '@pixel-codec/core'

export interface Fit {
	/** Position of the chosen rectangle in the free list */
	readonly index: number
	readonly x: number
	readonly y: number
	readonly width: number
	readonly height: number
	readonly rotated: boolean
	readonly leftover: number
}

/**
 * Two free rectangles sharing a full edge, as one
 */
function join(a: Rect, b: Rect): Rect | null {
	if (a.x === b.x && a.width === b.width) {
		if (a.y + a.height === b.y) return { x: a.x, y: a.y, width: a.width, height: a.height + b.height }
		if (b.y + b.height === a.y) return { x: a.x, y: b.y, width: a.width, height: a.height + b.height }
	}
	if (a.y === b.y && a.height === b.height) {
		if (a.x + a.width === b.x) return { x: a.x, y: a.y, width: a.width + b.width, height: a.height }
		if (b.x + b.width === a.x) return { x: b.x, y: a.y, width: a.width + b.width, height: a.height }
	}
	return null
}

/**
 * Free space of one atlas page as disjoint rectangles (guillotine splits)
 */
export class FreeRectList {
	private rects: Rect[]

	constructor(
		readonly width: number,
		readonly height: number
	) {
		this.rects = [{ x: 0, y: 0, width, height }]
	}

	get free(): readonly Rect[] {
		return this.rects
	}

	/**
	 * Rectangle leaving the least area unused; ties go to the smaller y,
	 * then x, then list order
	 */
	findFit(width: number, height: number, allowRotation: boolean): Fit | null {
		const orientations: [number, number, boolean][] = [[width, height, false]]
		if (allowRotation && width !== height) orientations.push([height, width, true])

		let best: Fit | null = null
		for (let index = 0; index < this.rects.length; index++) {
			const rect = this.rects[index]
			for (const [w, h, rotated] of orientations) {
				if (w > rect.width || h > rect.height) continue
				const leftover = rect.width * rect.height - w * h
				const better =
					best === null ||
					leftover < best.leftover ||
					(leftover === best.leftover && (rect.y < best.y || (rect.y === best.y && rect.x < best.x)))
				if (better) best = { index, x: rect.x, y: rect.y, width: w, height: h, rotated, leftover }
			}
		}
		return best
	}

	/**
	 * Occupy the top-left corner of the fitted rectangle, leaving a right
	 * strip and a bottom strip
	 */
	place(fit: Fit): void {
		const rect = this.rects[fit.index]
		const parts: Rect[] = [
			{ x: rect.x + fit.width, y: rect.y, width: rect.width - fit.width, height: fit.height },
			{ x: rect.x, y: rect.y + fit.height, width: rect.width, height: rect.height - fit.height },
		].filter((part) => part.width > 0 && part.height > 0)
		this.rects.splice(fit.index, 1, ...parts)
		let merged = this.mergeOnce()
		while (merged) merged = this.mergeOnce()
	}

	private mergeOnce(): boolean {
		for (let i = 0; i < this.rects.length; i++) {
			for (let j = i + 1; j < this.rects.length; j++) {
				const joined = join(this.rects[i], this.rects[j])
				if (joined) {
					this.rects[i] = joined
					this.rects.splice(j, 1)
					return true
				}
			}
		}
		return false
	}
}
