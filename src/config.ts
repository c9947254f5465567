export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent'

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export const DEFAULT_HANDLER_CAPACITY = 16

export interface Config {
  logLevel: LogLevel
  logFile: string | null
  listenAddress: string | null
  handlerCapacity: number
}

function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(l => l == level)
}

/**
 * Named pipes on windows live under `\\?\pipe\`.
 */
export function normalizeAddress(address: string, platform: NodeJS.Platform = process.platform): string {
  if (platform == 'win32' && !address.startsWith('\\\\')) {
    return '\\\\?\\pipe\\' + address
  }
  return address
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  let level = (env.NVIM_RPC_LOG_LEVEL || '').trim().toLowerCase()
  let capacity = Number(env.NVIM_RPC_HANDLER_CAPACITY)
  let address = env.NVIM_LISTEN_ADDRESS
  return {
    logLevel: isLogLevel(level) ? level : 'info',
    logFile: env.NVIM_RPC_LOG_FILE || null,
    listenAddress: address ? normalizeAddress(address) : null,
    handlerCapacity: Number.isInteger(capacity) && capacity > 0 ? capacity : DEFAULT_HANDLER_CAPACITY
  }
}
