import type { z } from 'zod'
import { InvalidInputError } from './errors'
import type { Palette, PixelBuffer } from './types'
import { MAX_PALETTE_SIZE } from './types'

/**
 * Validate an options object against its schema, filling in defaults
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
	const parsed = schema.safeParse(input ?? {})
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => ({
			path: issue.path.join('.'),
			message: issue.message,
		}))
		const first = issues[0]
		const detail = first ? `${first.path || '(root)'}: ${first.message}` : 'invalid value'
		throw new InvalidInputError(`Invalid ${context} options (${detail})`, { metadata: { issues } })
	}
	return parsed.data
}

/**
 * Check dimensions and sample count of a pixel buffer
 */
export function assertPixelBuffer(image: PixelBuffer, label = 'image'): void {
	const { width, height, data } = image
	if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
		throw new InvalidInputError(`${label} has invalid dimensions ${width}x${height}`, {
			metadata: { width, height },
		})
	}
	if (!(data instanceof Uint8Array) || data.length !== width * height * 4) {
		throw new InvalidInputError(
			`${label} sample count ${data.length} does not match ${width}x${height} RGBA`,
			{ metadata: { width, height, length: data.length } }
		)
	}
}

/**
 * Check palette size and entry ranges
 */
export function assertPalette(palette: Palette, label = 'palette'): void {
	if (palette.length < 1 || palette.length > MAX_PALETTE_SIZE) {
		throw new InvalidInputError(`${label} must hold 1..${MAX_PALETTE_SIZE} colors, got ${palette.length}`, {
			metadata: { size: palette.length },
		})
	}
	for (const entry of palette) {
		for (const channel of entry) {
			if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
				throw new InvalidInputError(`${label} entry [${entry.join(', ')}] is out of range`)
			}
		}
	}
}
