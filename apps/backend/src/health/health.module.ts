import { Module } from '@nestjs/common';
import { EvaluationModule } from '../evaluation/evaluation.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [EvaluationModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
