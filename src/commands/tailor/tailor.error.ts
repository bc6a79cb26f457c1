import { PreconditionFailedException } from '@nestjs/common'

// --docx requested but html-to-docx could not be loaded
export const DocxExporterMissingException = new PreconditionFailedException(
  'DOCX export requested but the "html-to-docx" package is not installed',
)
