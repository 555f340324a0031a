import { Controller, Get, Query } from '@nestjs/common';
import { HistoryLimitQueryDto } from './dto/history-limit-query.dto';
import { HistoryService } from './history.service';

@Controller('history')
export class HistoryController {
  constructor(private readonly historyService: HistoryService) {}

  @Get('attempts')
  recentAttempts(@Query() query: HistoryLimitQueryDto) {
    return this.historyService.getRecentAttempts(query.limit);
  }

  @Get('trend')
  bandTrend(@Query() query: HistoryLimitQueryDto) {
    return this.historyService.getBandTrend(query.limit);
  }

  @Get('criteria')
  criterionTrends(@Query() query: HistoryLimitQueryDto) {
    return this.historyService.getCriterionTrends(query.limit);
  }

  @Get('weak-areas')
  weakAreas() {
    return this.historyService.getWeakAreas();
  }

  @Get('weaknesses')
  weaknesses(@Query() query: HistoryLimitQueryDto) {
    return this.historyService.getDetailedWeaknesses(query.limit);
  }
}
