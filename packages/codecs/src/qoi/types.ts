/**
 * QOI (Quite OK Image) format types and constants
 * https://qoiformat.org/qoi-specification.pdf
 */

import { type Channels, type ColorSpace, type EventCapableOptions, checkedMultiply } from '@qoikit/core'

// Magic bytes "qoif"
export const QOI_MAGIC = 0x716f6966

export const QOI_HEADER_SIZE = 14

// 7x 0x00 followed by 0x01
export const QOI_END_MARKER: readonly number[] = [0, 0, 0, 0, 0, 0, 0, 1]

// Op codes
export const QOI_OP_INDEX = 0x00 // 00xxxxxx
export const QOI_OP_DIFF = 0x40 // 01xxxxxx
export const QOI_OP_LUMA = 0x80 // 10xxxxxx
export const QOI_OP_RUN = 0xc0 // 11xxxxxx
export const QOI_OP_RGB = 0xfe
export const QOI_OP_RGBA = 0xff

// Masks
export const QOI_MASK_2 = 0xc0

export const QOI_HASH_SIZE = 64

// Stored biased by -1; 63 and 64 would collide with QOI_OP_RGB / QOI_OP_RGBA
export const QOI_MAX_RUN = 62

// 5 bytes per pixel at worst keeps the stream under 2 GiB
export const QOI_DEFAULT_MAX_PIXELS = 400_000_000

// Returned by encodeQoiInto when the target buffer cannot hold the worst case
export const QOI_INSUFFICIENT_CAPACITY = -1

/**
 * QOI header structure (14 bytes)
 */
export interface QoiHeader {
	magic: number // "qoif"
	width: number // 32-bit big-endian
	height: number // 32-bit big-endian
	channels: Channels // 3 = RGB, 4 = RGBA
	colorspace: ColorSpace // 0 = sRGB, 1 = linear
}

export interface QoiEncodeOptions extends EventCapableOptions {
	/** Pixel ceiling; width * height must stay below it */
	maxPixels?: number
}

export interface QoiDecodeOptions extends EventCapableOptions {
	/** Channel width of the decoded raster, defaults to the stream's */
	channels?: Channels
	maxPixels?: number
}

/**
 * Calculate hash index for pixel
 */
export function qoiHash(r: number, g: number, b: number, a: number): number {
	return (r * 3 + g * 5 + b * 7 + a * 11) % QOI_HASH_SIZE
}

/**
 * Worst-case encoded size: every pixel as a literal plus its tag byte
 */
export function qoiMaxSize(width: number, height: number, channels: Channels): number {
	const pixels = checkedMultiply(width, height)
	return QOI_HEADER_SIZE + checkedMultiply(pixels, channels + 1) + QOI_END_MARKER.length
}

export function isValidChannels(value: number): value is Channels {
	return value === 3 || value === 4
}

export function isValidColorSpace(value: number): value is ColorSpace {
	return value === 0 || value === 1
}
