import { Module } from '@nestjs/common'
import { TailorService } from './tailor.service'
import { TailorCommand } from './tailor.command'
import { JobsModule } from '../jobs/jobs.module'
import { ProfileModule } from '../profile/profile.module'
import { EnginesModule } from '../../engines/engines.module'

@Module({
  imports: [JobsModule, ProfileModule, EnginesModule],
  providers: [TailorService, TailorCommand],
  exports: [TailorService, TailorCommand],
})
export class TailorModule {}
