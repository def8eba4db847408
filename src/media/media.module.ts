import { Module } from '@nestjs/common';
import { MediaGate } from './media-gate.service';

@Module({
  providers: [MediaGate],
  exports: [MediaGate],
})
export class MediaModule {}
