import { Module } from '@nestjs/common'
import { BulletSelectionEngine } from './selection/bullet-selection.engine'

@Module({
  providers: [BulletSelectionEngine],
  exports: [BulletSelectionEngine],
})
export class EnginesModule {}
