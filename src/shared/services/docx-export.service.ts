/// <reference path="../../types/html-to-docx.d.ts" />
import { Injectable } from '@nestjs/common'
import { LoggerService } from './logger.service'

type HtmlToDocx = typeof import('html-to-docx').default

/**
 * DocxExportService
 *
 * Converts the rendered HTML resume into a .docx buffer. The converter is
 * loaded on first use so the text outputs work without it.
 *
 * Throws Error('DOCX_EXPORTER_UNAVAILABLE') when the converter cannot be
 * loaded. The cause is logged at debug level only: the caller reports the
 * failure.
 */
@Injectable()
export class DocxExportService {
  private converter?: HtmlToDocx

  constructor(private readonly logger: LoggerService) {}

  async exportHtml(html: string, title: string): Promise<Buffer> {
    const convert = await this.loadConverter()
    return convert(html, null, {
      title,
      orientation: 'portrait',
      font: 'Calibri',
      fontSize: 22,
    })
  }

  private async loadConverter(): Promise<HtmlToDocx> {
    if (this.converter) return this.converter
    try {
      const mod = await import('html-to-docx')
      this.converter = mod.default
      return mod.default
    } catch (error) {
      this.logger.logDebug('DOCX converter failed to load', {
        service: 'DocxExportService',
        reason: error instanceof Error ? error.message : String(error),
      })
      throw new Error('DOCX_EXPORTER_UNAVAILABLE')
    }
  }
}
