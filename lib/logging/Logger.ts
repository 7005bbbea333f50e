export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const PREFIX = "[parse3ds]"

export const consoleLogger: Logger = {
  info: (message) => console.info(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} ${message}`),
  error: (message) => console.error(`${PREFIX} ${message}`),
}

/** Drops info-level messages and forwards the rest. */
export function createQuietLogger(inner: Logger = consoleLogger): Logger {
  return {
    info: () => {},
    warn: (message) => inner.warn(message),
    error: (message) => inner.error(message),
  }
}
