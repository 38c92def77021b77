import { Channels, type Raster, emit, rasterByteLength } from '@qoikit/core'
import { QoiError, assertQoiDimensions } from './errors'
import {
	QOI_DEFAULT_MAX_PIXELS,
	QOI_END_MARKER,
	QOI_HASH_SIZE,
	QOI_HEADER_SIZE,
	QOI_INSUFFICIENT_CAPACITY,
	QOI_MAGIC,
	QOI_MAX_RUN,
	QOI_OP_DIFF,
	QOI_OP_INDEX,
	QOI_OP_LUMA,
	QOI_OP_RGB,
	QOI_OP_RGBA,
	QOI_OP_RUN,
	type QoiEncodeOptions,
	isValidChannels,
	isValidColorSpace,
	qoiHash,
	qoiMaxSize,
} from './types'

/**
 * Difference of two bytes wrapped into -128..127
 */
function signedDelta(current: number, previous: number): number {
	return ((current - previous + 128) & 0xff) - 128
}

function packPixel(r: number, g: number, b: number, a: number): number {
	return ((r << 24) | (g << 16) | (b << 8) | a) >>> 0
}

/**
 * Encode Raster to QOI
 */
export function encodeQoi(raster: Raster, options: QoiEncodeOptions = {}): Uint8Array {
	validateRaster(raster, options)

	const output = new Uint8Array(qoiMaxSize(raster.width, raster.height, raster.channels))
	const written = writeQoi(raster, output, options)

	return output.slice(0, written)
}

/**
 * Encode Raster to QOI into a caller-supplied buffer.
 *
 * Returns the number of bytes written, or QOI_INSUFFICIENT_CAPACITY without
 * touching the buffer when it is smaller than qoiMaxSize() for this raster.
 */
export function encodeQoiInto(raster: Raster, buffer: Uint8Array, options: QoiEncodeOptions = {}): number {
	validateRaster(raster, options)

	if (buffer.length < qoiMaxSize(raster.width, raster.height, raster.channels)) {
		return QOI_INSUFFICIENT_CAPACITY
	}

	return writeQoi(raster, buffer, options)
}

/**
 * Write a validated raster into a buffer of at least qoiMaxSize() bytes
 */
function writeQoi(raster: Raster, buffer: Uint8Array, options: QoiEncodeOptions): number {
	const { width, height, channels, colorSpace, data } = raster

	// Write header
	const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
	view.setUint32(0, QOI_MAGIC, false)
	view.setUint32(4, width, false)
	view.setUint32(8, height, false)
	buffer[12] = channels
	buffer[13] = colorSpace
	let pos = QOI_HEADER_SIZE

	// Initialize state
	const index = new Uint32Array(QOI_HASH_SIZE)
	let prevR = 0
	let prevG = 0
	let prevB = 0
	let prevA = 255
	let run = 0

	const counts = { run: 0, index: 0, diff: 0, luma: 0, rgb: 0, rgba: 0 }
	const hasAlpha = channels === Channels.RGBA
	const lastOffset = data.length - channels

	for (let offset = 0; offset < data.length; offset += channels) {
		const r = data[offset]!
		const g = data[offset + 1]!
		const b = data[offset + 2]!
		const a = hasAlpha ? data[offset + 3]! : 255

		if (r === prevR && g === prevG && b === prevB && a === prevA) {
			run++
			if (run === QOI_MAX_RUN || offset === lastOffset) {
				buffer[pos++] = QOI_OP_RUN | (run - 1)
				counts.run++
				run = 0
			}
		} else {
			if (run > 0) {
				buffer[pos++] = QOI_OP_RUN | (run - 1)
				counts.run++
				run = 0
			}

			const hashIdx = qoiHash(r, g, b, a)
			const packed = packPixel(r, g, b, a)

			if (index[hashIdx] === packed) {
				buffer[pos++] = QOI_OP_INDEX | hashIdx
				counts.index++
			} else {
				index[hashIdx] = packed

				if (a === prevA) {
					const dr = signedDelta(r, prevR)
					const dg = signedDelta(g, prevG)
					const db = signedDelta(b, prevB)

					const dgr = dr - dg
					const dgb = db - dg

					if (dr >= -2 && dr <= 1 && dg >= -2 && dg <= 1 && db >= -2 && db <= 1) {
						buffer[pos++] = QOI_OP_DIFF | ((dr + 2) << 4) | ((dg + 2) << 2) | (db + 2)
						counts.diff++
					} else if (dgr >= -8 && dgr <= 7 && dg >= -32 && dg <= 31 && dgb >= -8 && dgb <= 7) {
						buffer[pos++] = QOI_OP_LUMA | (dg + 32)
						buffer[pos++] = ((dgr + 8) << 4) | (dgb + 8)
						counts.luma++
					} else {
						buffer[pos++] = QOI_OP_RGB
						buffer[pos++] = r
						buffer[pos++] = g
						buffer[pos++] = b
						counts.rgb++
					}
				} else {
					buffer[pos++] = QOI_OP_RGBA
					buffer[pos++] = r
					buffer[pos++] = g
					buffer[pos++] = b
					buffer[pos++] = a
					counts.rgba++
				}
			}
		}

		prevR = r
		prevG = g
		prevB = b
		prevA = a
	}

	// Write end marker
	buffer.set(QOI_END_MARKER, pos)
	pos += QOI_END_MARKER.length

	emit(options.onEvent, {
		phase: 'encode',
		level: 'info',
		code: 'encode.done',
		message: `Encoded ${width}x${height} QOI image.`,
		metrics: { width, height, channels, bytes: pos, ...counts },
	})

	return pos
}

function validateRaster(raster: Raster, options: QoiEncodeOptions): void {
	const { width, height, channels, colorSpace, data } = raster

	assertQoiDimensions(width, height, options.maxPixels ?? QOI_DEFAULT_MAX_PIXELS)

	if (!isValidChannels(channels)) {
		throw new QoiError('INVALID_HEADER', `Invalid QOI channel count: ${channels}`, { channels })
	}
	if (!isValidColorSpace(colorSpace)) {
		throw new QoiError('INVALID_HEADER', `Invalid QOI color space: ${colorSpace}`, { colorSpace })
	}

	const expected = rasterByteLength(width, height, channels)
	if (data.length !== expected) {
		throw new QoiError('INVALID_DATA_LENGTH', `Expected ${expected} bytes of pixel data, got ${data.length}`, {
			expected,
			actual: data.length,
		})
	}
}
