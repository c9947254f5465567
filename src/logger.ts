import pino, { type Logger } from 'pino'
import { loadConfig } from './config'

const config = loadConfig()

// stdout may be the rpc channel, never log there
const destination = config.logFile
  ? pino.destination({ dest: config.logFile, mkdir: true, sync: false })
  : pino.destination(2)

const root = pino({ name: 'nvim-rpc', level: config.logLevel }, destination)

export function createLogger(name: string): Logger {
  return root.child({ module: name })
}
