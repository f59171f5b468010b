/**
 * Scoped loggers backed by electron-log's Node entry.
 * File output is off by default: the host application decides where logs go.
 */
import log from 'electron-log/node'

log.transports.file.level = false

export type Logger = ReturnType<typeof log.scope>
export type LogLevelOption = typeof log.transports.console.level

export function createLogger(scope: string): Logger {
  return log.scope(scope)
}

/**
 * Set the console level for every registry logger (`false` silences them)
 */
export function setLogLevel(level: LogLevelOption): void {
  log.transports.console.level = level
}
