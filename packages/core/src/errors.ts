interface CodecErrorOptions {
	readonly metadata?: Record<string, unknown>
	readonly cause?: unknown
}

/**
 * Base class for every error raised by the codecs
 */
export class CodecError extends Error {
	readonly code: string
	readonly metadata: Record<string, unknown>

	constructor(code: string, message: string, options: CodecErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.name = new.target.name
		this.code = code
		this.metadata = options.metadata ?? {}
	}
}

/**
 * Checksum mismatch, malformed table, bad back-reference or truncated data
 */
export class CorruptStreamError extends CodecError {
	constructor(message: string, options?: CodecErrorOptions) {
		super('CORRUPT_STREAM', message, options)
	}
}

/**
 * Well-formed data using a feature this toolkit does not implement
 */
export class UnsupportedFormatError extends CodecError {
	constructor(message: string, options?: CodecErrorOptions) {
		super('UNSUPPORTED_FORMAT', message, options)
	}
}

/**
 * A sprite larger than the atlas page
 */
export class PackingError extends CodecError {
	constructor(message: string, options?: CodecErrorOptions) {
		super('PACKING_FAILED', message, options)
	}
}

/**
 * Invalid target color count
 */
export class QuantizationError extends CodecError {
	constructor(message: string, options?: CodecErrorOptions) {
		super('INVALID_COLOR_COUNT', message, options)
	}
}

/**
 * Caller passed arguments that cannot be encoded
 */
export class InvalidInputError extends CodecError {
	constructor(message: string, options?: CodecErrorOptions) {
		super('INVALID_INPUT', message, options)
	}
}
