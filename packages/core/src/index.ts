/**
 * @qoikit/core - Raster types shared by the codecs
 * Pure TypeScript, zero dependencies
 */

export * from './types'
export * from './events'
