import { Module } from '@nestjs/common'
import { JobsService } from './jobs.service'
import { JobsRepo } from './jobs.repo'
import { JobsCommand } from './jobs.command'

@Module({
  providers: [JobsService, JobsRepo, JobsCommand],
  exports: [JobsService, JobsRepo, JobsCommand],
})
export class JobsModule {}
