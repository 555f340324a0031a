import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { AssessmentService } from './assessment.service';
import { DetectFillersDto } from './dto/detect-fillers.dto';
import { ReadAloudDto } from './dto/read-aloud.dto';
import { SpeakingAssessmentDto } from './dto/speaking-assessment.dto';
import { WritingAssessmentDto } from './dto/writing-assessment.dto';

@Controller('assessments')
export class AssessmentController {
  constructor(private readonly assessmentService: AssessmentService) {}

  @Post('speaking')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { ttl: 60000, limit: 20 } })
  async speaking(@Body() body: SpeakingAssessmentDto) {
    return this.assessmentService.assessSpeaking(body);
  }

  @Post('writing')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { ttl: 60000, limit: 20 } })
  async writing(@Body() body: WritingAssessmentDto) {
    return this.assessmentService.assessWriting(body);
  }

  @Post('read-aloud')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { ttl: 60000, limit: 20 } })
  readAloud(@Body() body: ReadAloudDto) {
    return this.assessmentService.assessReadAloud(body);
  }

  @Post('fillers')
  @HttpCode(HttpStatus.OK)
  fillers(@Body() body: DetectFillersDto) {
    return this.assessmentService.detectFillers(body.transcript);
  }
}
