import { Controller, Get, Query } from '@nestjs/common';
import { ListEvaluationLogsQueryDto } from './dto/list-evaluation-logs-query.dto';
import { EvaluationLogsService } from './evaluation-logs.service';

@Controller('evaluations')
export class EvaluationLogsController {
  constructor(private readonly evaluationLogsService: EvaluationLogsService) {}

  @Get('logs')
  listLogs(@Query() query: ListEvaluationLogsQueryDto) {
    return this.evaluationLogsService.listLogs(query);
  }
}
