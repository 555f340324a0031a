import { Module } from '@nestjs/common';
import { AudioModule } from '../audio/audio.module';
import { EvaluationModule } from '../evaluation/evaluation.module';
import { HistoryModule } from '../history/history.module';
import { AssessmentController } from './assessment.controller';
import { AssessmentService } from './assessment.service';

@Module({
  imports: [AudioModule, EvaluationModule, HistoryModule],
  controllers: [AssessmentController],
  providers: [AssessmentService],
})
export class AssessmentModule {}
