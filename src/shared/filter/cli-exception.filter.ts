import { HttpException } from '@nestjs/common'
import { ZodError } from 'zod'
import type { LoggerService } from '../services/logger.service'

export interface DescribedError {
  message: string
  /** HttpException and option validation errors are caller mistakes; anything else is a bug */
  expected: boolean
}

function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`
}

export function describeCliError(error: unknown): DescribedError {
  if (error instanceof HttpException) {
    return { message: error.message, expected: true }
  }

  if (error instanceof ZodError) {
    const details = error.issues
      .map((issue) => (issue.path.length > 0 ? `${toFlag(issue.path.map(String).join('.'))}: ${issue.message}` : issue.message))
      .join('; ')
    return { message: `Invalid options: ${details}`, expected: true }
  }

  return { message: error instanceof Error ? error.message : String(error), expected: false }
}

/**
 * Report a fatal command error once on stderr and flag a non-zero exit.
 */
export function handleCliError(error: unknown, logger: LoggerService): void {
  const described = describeCliError(error)

  if (!described.expected) {
    logger.logError(error, { service: 'cli', operation: 'command' })
  }

  console.error(`Error: ${described.message}`)
  process.exitCode = 1
}
