/**
 * Tagged console logger.
 *
 * Every line is prefixed with a short time and the subsystem tag, e.g.
 * `[14:02:11] [game] finalized block 3 for user_2Lr...`.
 */

export type Logger = {
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, error?: unknown) => void
}

function stamp() {
  return new Date().toISOString().split('T')[1].split('.')[0]
}

function format(tag: string, message: string) {
  return `[${stamp()}] [${tag}] ${message}`
}

export function createLogger(tag: string): Logger {
  return {
    info(message, data) {
      if (data) console.log(format(tag, message), data)
      else console.log(format(tag, message))
    },
    warn(message, data) {
      if (data) console.warn(format(tag, message), data)
      else console.warn(format(tag, message))
    },
    error(message, error) {
      if (error !== undefined) console.error(format(tag, message), error)
      else console.error(format(tag, message))
    },
  }
}

/** Logger that drops everything; handy for tests and scripts. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
}
