import { Injectable } from '@nestjs/common'
import { TailorService } from './tailor.service'
import { TailorOptionsSchema } from './tailor.model'

@Injectable()
export class TailorCommand {
  constructor(private readonly tailorService: TailorService) {}

  async tailor(rawOptions: unknown): Promise<void> {
    const options = TailorOptionsSchema.parse(rawOptions)
    const output = await this.tailorService.tailor(options)

    if (output.fallback) {
      console.log(`No bullets matched job ${output.jobId}; used the first bullets of each experience.`)
    }
    console.log(`Resume: ${output.resumePath}`)
    if (output.docxPath) {
      console.log(`Resume (docx): ${output.docxPath}`)
    }
    console.log(`Cover letter: ${output.coverLetterPath}`)
  }
}
