import { Module } from '@nestjs/common';
import { AudioMetricsService } from './audio-metrics.service';

@Module({
  providers: [AudioMetricsService],
  exports: [AudioMetricsService],
})
export class AudioModule {}
