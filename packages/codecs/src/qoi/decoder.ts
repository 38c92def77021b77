import { Channels, type Raster, emit, rasterByteLength } from '@qoikit/core'
import { QoiError, assertQoiDimensions } from './errors'
import {
	QOI_DEFAULT_MAX_PIXELS,
	QOI_END_MARKER,
	QOI_HASH_SIZE,
	QOI_HEADER_SIZE,
	QOI_MAGIC,
	QOI_MASK_2,
	QOI_MAX_RUN,
	QOI_OP_DIFF,
	QOI_OP_INDEX,
	QOI_OP_LUMA,
	QOI_OP_RGB,
	QOI_OP_RGBA,
	type QoiDecodeOptions,
	type QoiHeader,
	isValidChannels,
	isValidColorSpace,
	qoiHash,
} from './types'

/**
 * Decode QOI to Raster
 */
export function decodeQoi(data: Uint8Array, options: QoiDecodeOptions = {}): Raster {
	const header = readQoiHeader(data)
	const { width, height, colorspace } = header
	const onEvent = options.onEvent

	assertQoiDimensions(width, height, options.maxPixels ?? QOI_DEFAULT_MAX_PIXELS)

	// Every op code covers at most QOI_MAX_RUN pixels
	const minLength = QOI_HEADER_SIZE + Math.ceil((width * height) / QOI_MAX_RUN) + QOI_END_MARKER.length
	if (data.length < minLength) {
		throw new QoiError('TRUNCATED_STREAM', `QOI stream of ${data.length} bytes cannot hold ${width}x${height} pixels`, {
			size: data.length,
			minLength,
		})
	}

	const channels = options.channels ?? header.channels
	if (!isValidChannels(channels)) {
		throw new QoiError('INVALID_HEADER', `Invalid output channel count: ${channels}`, { channels })
	}

	emit(onEvent, {
		phase: 'decode',
		level: 'info',
		code: 'decode.header',
		message: `Read QOI header for ${width}x${height} image.`,
		metrics: { width, height, channels: header.channels, colorspace },
	})

	const output = new Uint8Array(rasterByteLength(width, height, channels))
	const hasAlpha = channels === Channels.RGBA

	// Cache holds r, g, b, a per slot, initially all zero
	const index = new Uint8Array(QOI_HASH_SIZE * 4)
	let r = 0
	let g = 0
	let b = 0
	let a = 255

	let pos = QOI_HEADER_SIZE
	let outPos = 0
	const end = data.length

	const need = (count: number): void => {
		if (pos + count > end) {
			throw new QoiError('TRUNCATED_STREAM', 'QOI stream ended before all pixels were decoded', {
				offset: pos,
				decodedPixels: outPos / channels,
			})
		}
	}

	while (outPos < output.length) {
		need(1)
		const byte = data[pos++]!
		let run = 1
		let store = true

		if (byte === QOI_OP_RGB) {
			need(3)
			r = data[pos++]!
			g = data[pos++]!
			b = data[pos++]!
		} else if (byte === QOI_OP_RGBA) {
			need(4)
			r = data[pos++]!
			g = data[pos++]!
			b = data[pos++]!
			a = data[pos++]!
		} else {
			const op = byte & QOI_MASK_2

			if (op === QOI_OP_INDEX) {
				const slot = (byte & 0x3f) * 4
				r = index[slot]!
				g = index[slot + 1]!
				b = index[slot + 2]!
				a = index[slot + 3]!
				store = false
			} else if (op === QOI_OP_DIFF) {
				r = (r + ((byte >> 4) & 0x03) - 2) & 0xff
				g = (g + ((byte >> 2) & 0x03) - 2) & 0xff
				b = (b + (byte & 0x03) - 2) & 0xff
			} else if (op === QOI_OP_LUMA) {
				need(1)
				const byte2 = data[pos++]!
				const dg = (byte & 0x3f) - 32
				r = (r + dg + ((byte2 >> 4) & 0x0f) - 8) & 0xff
				g = (g + dg) & 0xff
				b = (b + dg + (byte2 & 0x0f) - 8) & 0xff
			} else {
				// Run: repeat the predictor
				run = (byte & 0x3f) + 1
				store = false
			}
		}

		if (store) {
			const slot = qoiHash(r, g, b, a) * 4
			index[slot] = r
			index[slot + 1] = g
			index[slot + 2] = b
			index[slot + 3] = a
		}

		const remaining = (output.length - outPos) / channels
		if (run > remaining) {
			throw new QoiError('MALFORMED_END_MARKER', `Run of ${run} pixels exceeds the ${remaining} pixels left in the image`, {
				run,
				remaining,
				offset: pos - 1,
			})
		}

		for (; run > 0; run--) {
			output[outPos++] = r
			output[outPos++] = g
			output[outPos++] = b
			if (hasAlpha) output[outPos++] = a
		}
	}

	checkEndMarker(data, pos)

	emit(onEvent, {
		phase: 'decode',
		level: 'info',
		code: 'decode.done',
		message: `Decoded ${width}x${height} QOI image.`,
		metrics: { width, height, channels, bytes: data.length },
	})

	return { width, height, channels, colorSpace: colorspace, data: output }
}

/**
 * Read and validate the QOI header
 */
export function readQoiHeader(data: Uint8Array): QoiHeader {
	if (data.length < QOI_HEADER_SIZE) {
		throw new QoiError('TRUNCATED_STREAM', 'Invalid QOI: too small', { size: data.length })
	}

	const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
	const magic = view.getUint32(0, false)

	if (magic !== QOI_MAGIC) {
		throw new QoiError('INVALID_MAGIC', 'Invalid QOI: bad magic', { magic })
	}

	const width = view.getUint32(4, false)
	const height = view.getUint32(8, false)
	const channels = data[12]!
	const colorspace = data[13]!

	if (width === 0 || height === 0) {
		throw new QoiError('INVALID_DIMENSION', 'Invalid QOI dimensions', { width, height })
	}
	if (!isValidChannels(channels)) {
		throw new QoiError('INVALID_HEADER', `Invalid QOI channel count: ${channels}`, { channels })
	}
	if (!isValidColorSpace(colorspace)) {
		throw new QoiError('INVALID_HEADER', `Invalid QOI color space: ${colorspace}`, { colorspace })
	}

	return { magic, width, height, channels, colorspace }
}

/**
 * The bytes after the last pixel must be exactly the end marker
 */
function checkEndMarker(data: Uint8Array, pos: number): void {
	const remaining = data.length - pos

	if (remaining < QOI_END_MARKER.length) {
		throw new QoiError('TRUNCATED_STREAM', 'QOI stream is missing its end marker', { offset: pos, remaining })
	}
	if (remaining > QOI_END_MARKER.length) {
		throw new QoiError('MALFORMED_END_MARKER', `Unexpected ${remaining - QOI_END_MARKER.length} trailing bytes`, {
			offset: pos,
			remaining,
		})
	}
	for (let i = 0; i < QOI_END_MARKER.length; i++) {
		if (data[pos + i] !== QOI_END_MARKER[i]) {
			throw new QoiError('MALFORMED_END_MARKER', 'Invalid QOI end marker', { offset: pos + i })
		}
	}
}
