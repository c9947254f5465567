import type { NvimBuffer, NvimWindow, NvimTabpage } from './meta'

/**
 * Correlation id reserved for requests that expect no response.
 */
export const NULL_MSGID = 0xffffffff

export type Handle = NvimBuffer | NvimWindow | NvimTabpage

/**
 * Any value a request may carry as an argument.
 */
export type RpcValue =
  | null
  | boolean
  | number
  | string
  | Buffer
  | Handle
  | RpcValue[]
  | RpcMap

export interface RpcMap {
  [key: string]: RpcValue
}

/**
 * 1 => request id
 * 2 => method name
 * 3 => arguments
 */
export type RequestMessage = [0, number, string, RpcValue[]]

/**
 * 1 => request id
 * 2 => error
 * 3 => result
 */
export type ResponseMessage = [1, number, unknown, unknown]

/**
 * 1 => event name
 * 2 => arguments
 */
export type NotificationMessage = [2, string, unknown[]]

export interface ResponseEnvelope {
  kind: 'response'
  id: number
  error: unknown
  result: unknown
}

export interface NotificationEnvelope {
  kind: 'notification'
  name: string
  args: unknown[]
}

// the only envelopes a client receives
export type Envelope = ResponseEnvelope | NotificationEnvelope

export type ResponseHandler = (error: unknown, result: unknown) => void

/**
 * Receiver of everything the UI needs from the session.
 */
export interface UiSink {
  /**
   * Arguments of one `redraw` notification, a list of event batches.
   */
  redraw(events: unknown[]): void
  /**
   * The peer closed the stream.
   */
  close(): void
  /**
   * Both event sources are cancelled; nothing more will be delivered.
   */
  shutdown(): void
}
