import { Test } from '@nestjs/testing'
import { DocxExportService } from './docx-export.service'
import { LoggerService } from './logger.service'
import { handleCliError } from '../filter/cli-exception.filter'
import { DocxExporterMissingException } from '../../commands/tailor/tailor.error'

jest.mock('html-to-docx', () => {
  throw new Error('Cannot find module html-to-docx')
})

describe('DocxExportService without a converter', () => {
  let service: DocxExportService
  let logger: LoggerService
  const originalExitCode = process.exitCode

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [DocxExportService, LoggerService],
    }).compile()

    service = moduleRef.get(DocxExportService)
    logger = moduleRef.get(LoggerService)
  })

  afterEach(() => {
    process.exitCode = originalExitCode
    jest.restoreAllMocks()
  })

  it('rejects with the unavailable sentinel and logs the cause at debug level', async () => {
    const logDebug = jest.spyOn(logger, 'logDebug')

    await expect(service.exportHtml('<p>hi</p>', 'Resume')).rejects.toThrow('DOCX_EXPORTER_UNAVAILABLE')
    expect(logDebug).toHaveBeenCalledWith('DOCX converter failed to load', {
      service: 'DocxExportService',
      reason: 'Cannot find module html-to-docx',
    })
  })

  it('leaves a single stderr line once the command reports the failure', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined)

    await expect(service.exportHtml('<p>hi</p>', 'Resume')).rejects.toThrow('DOCX_EXPORTER_UNAVAILABLE')
    handleCliError(DocxExporterMissingException, logger)

    expect(consoleError).toHaveBeenCalledTimes(1)
    expect(consoleError).toHaveBeenCalledWith(`Error: ${DocxExporterMissingException.message}`)
  })
})
