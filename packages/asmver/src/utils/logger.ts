import { consola, LogLevels } from 'consola'

consola.options.formatOptions = {
  colors: true,
  compact: false,
  date: false
}
consola.level = LogLevels.info

/** Directory walking, reading and writing of version files */
export const fileLogger = consola.withTag('files')
/** Declaration matching and the update run itself */
export const versionLogger = consola.withTag('version')
/** Configuration file discovery and validation */
export const configLogger = consola.withTag('config')
/** Command line output and signal handling */
export const cliLogger = consola.withTag('cli')

export interface LoggingOptions {
  /** List every scanned file and skipped directory */
  verbose?: boolean
  /** Only report warnings and failures; wins over verbose */
  quiet?: boolean
}

export function configureLogging(options: LoggingOptions = {}) {
  if (options.quiet) {
    consola.level = LogLevels.warn
  } else {
    consola.level = options.verbose ? LogLevels.debug : LogLevels.info
  }
}

// Untagged run milestones shown by the update command
export const operation = {
  start: (message: string) => consola.start(message),
  fail: (message: string) => consola.fail(message),
  warn: (message: string) => consola.warn(message),
}

export default consola
