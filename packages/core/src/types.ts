/**
 * Channel layout of a raster
 */
export enum Channels {
	RGB = 3,
	RGBA = 4,
}

/**
 * Color space tag. Carried through codecs unchanged, never interpreted.
 */
export enum ColorSpace {
	SRGB = 0, // gamma-encoded color, linear alpha
	Linear = 1, // all channels linear
}

/**
 * Raw raster, row-major with interleaved channels (R, G, B[, A])
 */
export interface Raster {
	readonly width: number
	readonly height: number
	readonly channels: Channels
	readonly colorSpace: ColorSpace
	readonly data: Uint8Array // length = width * height * channels
}

/**
 * A single pixel, always expanded to RGBA
 */
export type Pixel = [r: number, g: number, b: number, a: number]

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T, EncodeOpts = undefined, DecodeOpts = undefined> {
	decode(data: Uint8Array, options?: DecodeOpts): T
	encode(input: T, options?: EncodeOpts): Uint8Array
}

/**
 * Multiply two non-negative integers, failing instead of losing precision
 */
export function checkedMultiply(a: number, b: number): number {
	const product = a * b
	if (!Number.isSafeInteger(product)) {
		throw new RangeError(`Size overflow: ${a} * ${b}`)
	}
	return product
}

/**
 * Byte length of a raster buffer
 */
export function rasterByteLength(width: number, height: number, channels: Channels): number {
	return checkedMultiply(checkedMultiply(width, height), channels)
}

/**
 * Create empty Raster
 */
export function createRaster(
	width: number,
	height: number,
	channels: Channels = Channels.RGBA,
	colorSpace: ColorSpace = ColorSpace.SRGB
): Raster {
	return {
		width,
		height,
		channels,
		colorSpace,
		data: new Uint8Array(rasterByteLength(width, height, channels)),
	}
}

/**
 * Clone Raster
 */
export function cloneRaster(raster: Raster): Raster {
	return {
		width: raster.width,
		height: raster.height,
		channels: raster.channels,
		colorSpace: raster.colorSpace,
		data: new Uint8Array(raster.data),
	}
}

/**
 * Get pixel at (x, y). Alpha reads as 255 on RGB rasters.
 */
export function getPixel(raster: Raster, x: number, y: number): Pixel {
	const { channels, data } = raster
	const idx = (y * raster.width + x) * channels
	const a = channels === Channels.RGBA ? data[idx + 3]! : 255
	return [data[idx]!, data[idx + 1]!, data[idx + 2]!, a]
}

/**
 * Set pixel at (x, y). Alpha is dropped on RGB rasters.
 */
export function setPixel(
	raster: Raster,
	x: number,
	y: number,
	r: number,
	g: number,
	b: number,
	a: number
): void {
	const { channels, data } = raster
	const idx = (y * raster.width + x) * channels
	data[idx] = r
	data[idx + 1] = g
	data[idx + 2] = b
	if (channels === Channels.RGBA) data[idx + 3] = a
}
