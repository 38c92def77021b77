export * from './types'
export * from './errors'
export { encodeQoi, encodeQoiInto } from './encoder'
export { decodeQoi, readQoiHeader } from './decoder'
export { QoiCodec, isQoi } from './codec'
