import { Module } from '@nestjs/common'
import { ProfileRepo } from './profile.repo'

@Module({
  providers: [ProfileRepo],
  exports: [ProfileRepo],
})
export class ProfileModule {}
