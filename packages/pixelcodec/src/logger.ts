import pino from 'pino'
import { z } from 'zod'

const levelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).catch('warn')

/**
 * Root logger; PIXELCODEC_LOG_LEVEL picks the level (warn when unset or unknown)
 */
export const logger = pino({
	name: 'pixelcodec',
	level: levelSchema.parse(process.env.PIXELCODEC_LOG_LEVEL),
})

export function createChildLogger(bindings: pino.Bindings): pino.Logger {
	return logger.child(bindings)
}
