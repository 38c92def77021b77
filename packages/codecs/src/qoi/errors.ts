export type QoiErrorCode =
	| 'INVALID_DIMENSION'
	| 'INVALID_HEADER'
	| 'INVALID_DATA_LENGTH'
	| 'INVALID_MAGIC'
	| 'TRUNCATED_STREAM'
	| 'MALFORMED_END_MARKER'

export class QoiError extends Error {
	public readonly code: QoiErrorCode
	public readonly details?: Record<string, string | number>

	constructor(code: QoiErrorCode, message: string, details?: Record<string, string | number>) {
		super(message)
		this.name = 'QoiError'
		this.code = code
		this.details = details
	}
}

export function isQoiError(value: unknown): value is QoiError {
	return value instanceof QoiError
}

/**
 * Reject zero, non-integer or oversized dimensions. The ceiling is checked as
 * height against maxPixels / width so the product is never formed.
 */
export function assertQoiDimensions(width: number, height: number, maxPixels: number): void {
	if (!Number.isSafeInteger(maxPixels) || maxPixels <= 0) {
		throw new QoiError('INVALID_DIMENSION', `Invalid QOI pixel ceiling: ${maxPixels}`, { maxPixels })
	}
	if (!Number.isInteger(width) || width <= 0 || width > 0xffffffff) {
		throw new QoiError('INVALID_DIMENSION', `Invalid QOI width: ${width}`, { width })
	}
	const heightLimit = Math.floor(maxPixels / width)
	if (!Number.isInteger(height) || height <= 0 || height >= heightLimit) {
		throw new QoiError(
			'INVALID_DIMENSION',
			`Invalid QOI height: ${height}. Maximum for this width is ${Math.max(heightLimit - 1, 0)}`,
			{ width, height, maxPixels }
		)
	}
}
