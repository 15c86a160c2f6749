/**
 * Sprite and animation codecs, color reduction and atlas packing
 */

export {
	type AddResult,
	AtlasBuilder,
	type AtlasJson,
	type AtlasPlacement,
	type AtlasResult,
	type AtlasSource,
	type PackOptions,
	packAtlas,
	toAtlasJson,
} from '@pixel-codec/atlas'
export type {
	ApngAnimation,
	ApngEncodeOptions,
	ApngFrameInput,
	AsepriteCel,
	AsepriteLayer,
	AsepriteSprite,
	AsepriteTag,
	DecodedApng,
	DecodedApngFrame,
	DecodedGif,
	DecodedGifFrame,
	FrameOptions,
	GifEncodeOptions,
	GifFrameInput,
	PngEncodeOptions,
} from '@pixel-codec/codecs'
export {
	type DistanceMetric,
	type DitherMethod,
	type DitherOptions,
	type QuantizeAlgorithm,
	type QuantizeResult,
	dither,
	extractPalette,
	labToRgb,
	nearestColor,
	quantize,
	remap,
	rgbToLab,
} from '@pixel-codec/color'
export {
	CodecError,
	CorruptStreamError,
	InvalidInputError,
	PackingError,
	QuantizationError,
	UnsupportedFormatError,
	type Format,
	type Palette,
	type PixelBuffer,
	type Rgba,
	detectFormat,
} from '@pixel-codec/core'
export { loadLayeredSpriteFile, saveAnimatedRaster, saveAtlas, saveIndexedAnimation, saveRaster } from './files'
export { writeFileAtomic } from './io'
export { createChildLogger, logger } from './logger'
export {
	compress,
	decodeAnimatedRaster,
	decodeImage,
	decodeIndexedAnimation,
	decodeLayeredSpriteFile,
	decodeRaster,
	decompress,
	encodeAnimatedRaster,
	encodeIndexedAnimation,
	encodeRaster,
} from './operations'
