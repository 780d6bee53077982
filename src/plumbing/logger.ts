import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogFields = { message: string; [key: string]: unknown }

export type LogLevel = 'info' | 'warn' | 'error'

const write = (message: string | LogFields, level: LogLevel): void => {
  const fields = typeof message === 'string' ? { message } : message
  const logMessage: LogFields & { app: string; version: string } = {
    ...fields,
    app: name,
    version,
  }
  if (level !== 'info') {
    logMessage.level = level
  }
  console.log(logMessage)
}

export const log = (message: string | LogFields): void => {
  write(message, 'info')
}

export const logWarning = (message: string | LogFields): void => {
  write(message, 'warn')
}

export const logError = (message: string | LogFields): void => {
  write(message, 'error')
}

/** Message text of an unknown thrown value. */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
