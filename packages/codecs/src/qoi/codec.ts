import type { Codec, Raster } from '@qoikit/core'
import { decodeQoi } from './decoder'
import { encodeQoi } from './encoder'
import { QOI_HEADER_SIZE, QOI_MAGIC, type QoiDecodeOptions, type QoiEncodeOptions } from './types'

/**
 * QOI (Quite OK Image) codec
 */
export const QoiCodec: Codec<Raster, QoiEncodeOptions, QoiDecodeOptions> = {
	decode(data: Uint8Array, options?: QoiDecodeOptions): Raster {
		return decodeQoi(data, options)
	},

	encode(image: Raster, options?: QoiEncodeOptions): Uint8Array {
		return encodeQoi(image, options)
	},
}

/**
 * Check for the "qoif" magic
 */
export function isQoi(data: Uint8Array): boolean {
	if (data.length < QOI_HEADER_SIZE) return false
	const magic = ((data[0]! << 24) | (data[1]! << 16) | (data[2]! << 8) | data[3]!) >>> 0
	return magic === QOI_MAGIC
}
