import { Module } from '@nestjs/common'
import { SharedModule } from './shared/shared.module'
import { EnginesModule } from './engines/engines.module'
import { JobsModule } from './commands/jobs/jobs.module'
import { ProfileModule } from './commands/profile/profile.module'
import { TailorModule } from './commands/tailor/tailor.module'

@Module({
  imports: [SharedModule, EnginesModule, JobsModule, ProfileModule, TailorModule],
})
export class AppModule {}
