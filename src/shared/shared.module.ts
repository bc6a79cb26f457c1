import { Global, Module } from '@nestjs/common'
import { LoggerService } from './services/logger.service'
import { BrowserService } from './services/browser.service'
import { ResumeRenderService } from './services/resume-render.service'
import { CoverLetterService } from './services/cover-letter.service'
import { DocxExportService } from './services/docx-export.service'

const sharedServices = [LoggerService, BrowserService, ResumeRenderService, CoverLetterService, DocxExportService]
@Global()
@Module({
  providers: [...sharedServices],
  exports: [...sharedServices],
})
export class SharedModule {}
