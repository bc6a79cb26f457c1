#!/usr/bin/env node
import 'reflect-metadata'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { buildProgram } from './cli'
import { LoggerService } from './shared/services/logger.service'
import { handleCliError } from './shared/filter/cli-exception.filter'

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error'],
  })

  try {
    await buildProgram(app).parseAsync(process.argv)
  } catch (error) {
    handleCliError(error, app.get(LoggerService))
  } finally {
    await app.close()
  }
}

bootstrap().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
