import { Channels, type CodecEvent, ColorSpace, type Raster } from '@qoikit/core'
import { describe, expect, test } from 'vitest'
import { encodeQoi, encodeQoiInto } from './encoder'
import { QOI_INSUFFICIENT_CAPACITY, qoiHash, qoiMaxSize } from './types'

const raster = (width: number, height: number, channels: Channels, pixels: number[]): Raster => ({
	width,
	height,
	channels,
	colorSpace: ColorSpace.SRGB,
	data: new Uint8Array(pixels),
})

// Opcode bytes between the header and the end marker
const body = (encoded: Uint8Array): number[] => Array.from(encoded.subarray(14, encoded.length - 8))

describe('QOI encoder', () => {
	describe('header', () => {
		test('writes magic, dimensions, channels and color space', () => {
			const image: Raster = { ...raster(2, 1, Channels.RGB, [1, 2, 3, 4, 5, 6]), colorSpace: ColorSpace.Linear }
			const encoded = encodeQoi(image)

			expect(Array.from(encoded.subarray(0, 14))).toEqual([
				0x71, 0x6f, 0x69, 0x66, 0, 0, 0, 2, 0, 0, 0, 1, 3, 1,
			])
		})

		test('writes large dimensions big-endian', () => {
			const image = raster(0x0102, 1, Channels.RGB, new Array(0x0102 * 3).fill(0))
			const encoded = encodeQoi(image)

			expect(Array.from(encoded.subarray(4, 8))).toEqual([0, 0, 0x01, 0x02])
		})

		test('ends with the end marker', () => {
			const encoded = encodeQoi(raster(1, 1, Channels.RGB, [9, 9, 9]))
			expect(Array.from(encoded.subarray(encoded.length - 8))).toEqual([0, 0, 0, 0, 0, 0, 0, 1])
		})
	})

	describe('op codes', () => {
		test('encodes a solid RGB image as a single run', () => {
			const encoded = encodeQoi(raster(2, 2, Channels.RGB, new Array(12).fill(0)))

			expect(encoded.length).toBe(23)
			expect(body(encoded)).toEqual([0xc3])
		})

		test('flushes a run at 62 pixels', () => {
			const pixels = [...new Array(62 * 3).fill(0), 1, 1, 1]
			const encoded = encodeQoi(raster(63, 1, Channels.RGB, pixels))

			expect(body(encoded)).toEqual([0xc0 | 61, 0x7f])
		})

		test('splits 63 identical pixels into two runs', () => {
			const encoded = encodeQoi(raster(63, 1, Channels.RGB, new Array(63 * 3).fill(0)))

			expect(body(encoded)).toEqual([0xc0 | 61, 0xc0])
		})

		test('writes an RGB literal when deltas are too large', () => {
			const encoded = encodeQoi(raster(1, 1, Channels.RGBA, [10, 20, 30, 255]))

			expect(encoded.length).toBe(26)
			expect(body(encoded)).toEqual([0xfe, 10, 20, 30])
		})

		test('writes a luma op for green-correlated deltas', () => {
			const encoded = encodeQoi(raster(1, 1, Channels.RGB, [25, 20, 15]))

			// vg = 20, vg_r = 5, vg_b = -5
			expect(body(encoded)).toEqual([0x80 | 52, (13 << 4) | 3])
		})

		test('wraps channel deltas around 8 bits', () => {
			const encoded = encodeQoi(raster(2, 1, Channels.RGB, [255, 255, 255, 0, 0, 0]))

			// 0 -> 255 is -1, 255 -> 0 is +1
			expect(body(encoded)).toEqual([0x55, 0x7f])
		})

		test('forces an RGBA literal when only alpha changes', () => {
			const encoded = encodeQoi(raster(2, 1, Channels.RGBA, [0, 0, 0, 255, 0, 0, 0, 128]))

			expect(body(encoded)).toEqual([0xc0, 0xff, 0, 0, 0, 128])
		})

		test('emits an index op for a cached color', () => {
			const a = [100, 0, 0, 255]
			const c = [0, 0, 0, 255]
			const encoded = encodeQoi(raster(3, 1, Channels.RGBA, [...a, ...c, ...a]))

			expect(qoiHash(100, 0, 0, 255)).toBe(33)
			expect(body(encoded)).toEqual([0xfe, 100, 0, 0, 0xfe, 0, 0, 0, 0x00 | 33])
		})

		test('overwrites a cache slot on collision', () => {
			const a = [100, 0, 0, 255]
			const b = [164, 0, 0, 255]
			expect(qoiHash(164, 0, 0, 255)).toBe(qoiHash(100, 0, 0, 255))

			const encoded = encodeQoi(raster(3, 1, Channels.RGBA, [...a, ...b, ...a]))

			expect(body(encoded)).toEqual([0xfe, 100, 0, 0, 0xfe, 164, 0, 0, 0xfe, 100, 0, 0])
		})
	})

	describe('encodeQoiInto', () => {
		const solid = raster(2, 2, Channels.RGBA, [0, 0, 0, 255, 0, 0, 0, 255, 0, 0, 0, 255, 0, 0, 0, 255])

		test('returns the sentinel and leaves a short buffer untouched', () => {
			const buffer = new Uint8Array(qoiMaxSize(2, 2, Channels.RGBA) - 1)

			expect(encodeQoiInto(solid, buffer)).toBe(QOI_INSUFFICIENT_CAPACITY)
			expect(buffer.every((byte) => byte === 0)).toBe(true)
		})

		test('writes into a buffer of the worst-case size', () => {
			const buffer = new Uint8Array(qoiMaxSize(2, 2, Channels.RGBA))

			expect(buffer.length).toBe(42)
			expect(encodeQoiInto(solid, buffer)).toBe(23)
			expect(buffer[14]).toBe(0xc3)
		})

		test('writes the same bytes as encodeQoi and reports once', () => {
			const image = raster(3, 1, Channels.RGBA, [100, 0, 0, 255, 0, 0, 0, 255, 100, 0, 0, 255])
			const events: CodecEvent[] = []
			const buffer = new Uint8Array(qoiMaxSize(3, 1, Channels.RGBA))
			const written = encodeQoiInto(image, buffer, { onEvent: (event) => events.push(event) })

			expect(Array.from(buffer.subarray(0, written))).toEqual(Array.from(encodeQoi(image)))
			expect(events.map((event) => event.code)).toEqual(['encode.done'])
		})

		test('respects the byte offset of a subarray', () => {
			const backing = new Uint8Array(50)
			const written = encodeQoiInto(solid, backing.subarray(4))

			expect(written).toBe(23)
			expect(Array.from(backing.subarray(4, 8))).toEqual([0x71, 0x6f, 0x69, 0x66])
		})
	})

	describe('validation', () => {
		test('rejects zero width', () => {
			expect(() => encodeQoi(raster(0, 1, Channels.RGB, []))).toThrow(expect.objectContaining({ code: 'INVALID_DIMENSION' }))
		})

		test('rejects zero height', () => {
			expect(() => encodeQoi(raster(1, 0, Channels.RGB, []))).toThrow(expect.objectContaining({ code: 'INVALID_DIMENSION' }))
		})

		test('rejects images at the default pixel ceiling before touching data', () => {
			const image = raster(20000, 20000, Channels.RGBA, [])
			expect(() => encodeQoi(image)).toThrow(expect.objectContaining({ code: 'INVALID_DIMENSION' }))
		})

		test('applies a custom pixel ceiling', () => {
			const over = raster(10, 10, Channels.RGB, new Array(300).fill(0))
			const under = raster(10, 9, Channels.RGB, new Array(270).fill(0))

			expect(() => encodeQoi(over, { maxPixels: 100 })).toThrow(expect.objectContaining({ code: 'INVALID_DIMENSION' }))
			expect(body(encodeQoi(under, { maxPixels: 100 }))).toEqual([0xc0 | 61, 0xc0 | 27])
		})

		test('rejects a buffer of the wrong length', () => {
			expect(() => encodeQoi(raster(2, 2, Channels.RGB, [1, 2, 3]))).toThrow(
				expect.objectContaining({ code: 'INVALID_DATA_LENGTH', details: { expected: 12, actual: 3 } })
			)
		})

		test('rejects a pixel ceiling that is not a positive integer', () => {
			const image = raster(20000, 20000, Channels.RGBA, [])
			for (const maxPixels of [Number.NaN, 0, -1, 1.5]) {
				expect(() => encodeQoi(image, { maxPixels })).toThrow(
					expect.objectContaining({ code: 'INVALID_DIMENSION', details: { maxPixels } })
				)
			}
		})
	})

	test('reports op code counts through onEvent', () => {
		const events: CodecEvent[] = []
		encodeQoi(raster(2, 2, Channels.RGB, new Array(12).fill(0)), { onEvent: (event) => events.push(event) })

		expect(events).toHaveLength(1)
		expect(events[0]).toMatchObject({
			phase: 'encode',
			level: 'info',
			code: 'encode.done',
			metrics: { bytes: 23, run: 1, index: 0, diff: 0, luma: 0, rgb: 0, rgba: 0 },
		})
	})
})
