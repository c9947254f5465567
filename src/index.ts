export { default as Session, abortProcess } from './model/session'
export type { FatalPolicy, SessionOptions, SessionState } from './model/session'
export { default as Connection, connect, spawn, maxSocketPath } from './model/connection'
export { createCodec, encodeRequest, FrameDecoder, WriteBuffer } from './model/codec'
export type { Unpacked } from './model/codec'
export { default as HandlerTable } from './model/handlers'
export { classify } from './model/message'
export { default as SerialQueue } from './model/queue'
export { EventSource, ReadSource, WriteSource } from './model/source'
export type { IoHandler, SourceKind, SourceState } from './model/source'
export { NvimBuffer, NvimWindow, NvimTabpage } from './meta'
export { TransportError, RpcError } from './errors'
export { loadConfig, normalizeAddress } from './config'
export type { Config, LogLevel } from './config'
export { createLogger } from './logger'
export { NULL_MSGID } from './types'
export type {
  Envelope,
  Handle,
  NotificationEnvelope,
  ResponseEnvelope,
  ResponseHandler,
  RpcMap,
  RpcValue,
  UiSink
} from './types'
