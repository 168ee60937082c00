export * from './types'
export * from './errors'
export { ByteCounter } from './counter'
export type { CounterOptions } from './counter'
export { ReadCounter, AsyncReadCounter } from './read-counter'
export { WriteCounter, AsyncWriteCounter } from './write-counter'
export { BytesReader, BytesWriter } from './bytes'
export { logger, LogFormat } from './logger'
