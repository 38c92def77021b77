/**
 * @qoikit/codecs - Lossless image codecs
 * Pure TypeScript, zero dependencies
 */

export * from './qoi'
