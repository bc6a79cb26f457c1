import { Injectable } from '@nestjs/common'
import envConfig, { LOG_LEVELS } from '../config'
import type { LogLevel } from '../config'

export interface ErrorContext {
  service?: string
  operation?: string
  jobId?: string
  [key: string]: unknown
}

/**
 * Structured JSON logs on stderr. Stdout carries command output only.
 */
@Injectable()
export class LoggerService {
  private readonly threshold = LOG_LEVELS.indexOf(envConfig.LOG_LEVEL)

  /**
   * Log errors with structured context
   */
  logError(error: Error | unknown, context?: ErrorContext) {
    const errorObj = error instanceof Error ? error : new Error(String(error))

    this.write('error', {
      type: 'ERROR',
      timestamp: new Date().toISOString(),
      message: errorObj.message,
      stack: errorObj.stack,
      ...context,
    })
  }

  /**
   * Log warnings
   */
  logWarning(message: string, context?: Record<string, unknown>) {
    this.write('warn', {
      type: 'WARNING',
      timestamp: new Date().toISOString(),
      message,
      ...context,
    })
  }

  /**
   * Log general info
   */
  logInfo(message: string, context?: Record<string, unknown>) {
    this.write('info', {
      type: 'INFO',
      timestamp: new Date().toISOString(),
      message,
      ...context,
    })
  }

  logDebug(message: string, context?: Record<string, unknown>) {
    this.write('debug', {
      type: 'DEBUG',
      timestamp: new Date().toISOString(),
      message,
      ...context,
    })
  }

  private write(level: LogLevel, record: Record<string, unknown>) {
    if (LOG_LEVELS.indexOf(level) > this.threshold) return
    console.error(JSON.stringify(record))
  }
}
