import { Injectable } from '@nestjs/common'
import fs from 'fs'
import path from 'path'
import { JobsService } from '../jobs/jobs.service'
import { ProfileRepo } from '../profile/profile.repo'
import { BulletSelectionEngine } from '../../engines/selection/bullet-selection.engine'
import { ResumeRenderService } from '../../shared/services/resume-render.service'
import { CoverLetterService } from '../../shared/services/cover-letter.service'
import { DocxExportService } from '../../shared/services/docx-export.service'
import { LoggerService } from '../../shared/services/logger.service'
import envConfig from '../../shared/config'
import { DocxExporterMissingException } from './tailor.error'
import { coverLetterFileName, resumeFileName } from './tailor.model'
import type { TailorOptions, TailorOutput } from './tailor.model'

@Injectable()
export class TailorService {
  constructor(
    private readonly jobsService: JobsService,
    private readonly profileRepo: ProfileRepo,
    private readonly selectionEngine: BulletSelectionEngine,
    private readonly resumeRenderService: ResumeRenderService,
    private readonly coverLetterService: CoverLetterService,
    private readonly docxExportService: DocxExportService,
    private readonly logger: LoggerService,
  ) {}

  async tailor(options: TailorOptions): Promise<TailorOutput> {
    const jobsSource = options.jobs ?? envConfig.JOBS_CSV_PATH
    const profileSource = options.profile ?? envConfig.PROFILE_PATH
    const outDir = options.outDir ?? envConfig.OUTPUT_DIR

    const posting = await this.jobsService.getPostingById(jobsSource, options.jobId)
    const profile = await this.profileRepo.findProfile(profileSource)

    const selection = this.selectionEngine.select(profile, posting, {
      perGroupCap: options.perGroupCap ?? envConfig.PER_GROUP_CAP,
      globalCap: options.globalCap ?? envConfig.GLOBAL_CAP,
      keywordTopK: envConfig.SELECTION_KEYWORD_TOP_K,
    })

    if (selection.fallback) {
      this.logger.logWarning('No bullet matched the posting keywords, using the default selection', {
        service: 'TailorService',
        jobId: posting.id,
      })
    }

    const layout = this.resumeRenderService.buildLayout(profile, selection.items)
    const coverLetter = this.coverLetterService.compose(profile, posting, envConfig.COVER_LETTER_KEYWORD_TOP_K)

    // Convert before writing anything so a missing converter leaves no partial output
    let docxBuffer: Buffer | undefined
    if (options.docx) {
      try {
        docxBuffer = await this.docxExportService.exportHtml(
          this.resumeRenderService.toHtml(layout),
          `${profile.name} - ${posting.title}`,
        )
      } catch (error) {
        if (error instanceof Error && error.message === 'DOCX_EXPORTER_UNAVAILABLE') {
          throw DocxExporterMissingException
        }
        throw error
      }
    }

    await fs.promises.mkdir(outDir, { recursive: true })

    const resumePath = path.join(outDir, resumeFileName(posting.id, 'md'))
    await this.writeOutput(resumePath, this.resumeRenderService.toMarkdown(layout), posting.id)

    const coverLetterPath = path.join(outDir, coverLetterFileName(posting.id))
    await this.writeOutput(coverLetterPath, coverLetter.text, posting.id)

    let docxPath: string | undefined
    if (docxBuffer) {
      docxPath = path.join(outDir, resumeFileName(posting.id, 'docx'))
      await this.writeOutput(docxPath, docxBuffer, posting.id)
    }

    return {
      jobId: posting.id,
      resumePath,
      coverLetterPath,
      ...(docxPath ? { docxPath } : {}),
      fallback: selection.fallback,
      selectedCount: selection.items.length,
    }
  }

  private async writeOutput(filePath: string, content: string | Buffer, jobId: string) {
    await fs.promises.writeFile(filePath, content)
    this.logger.logInfo('Wrote output file', {
      service: 'TailorService',
      jobId,
      path: filePath,
    })
  }
}
