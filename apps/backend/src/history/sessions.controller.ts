import { Body, Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { CreateSessionDto } from './dto/create-session.dto';
import { HistoryLimitQueryDto } from './dto/history-limit-query.dto';
import { HistoryService } from './history.service';

@Controller('sessions')
export class SessionsController {
  constructor(private readonly historyService: HistoryService) {}

  @Post()
  create(@Body() body: CreateSessionDto) {
    return this.historyService.createSession(body.mode);
  }

  @Get()
  list(@Query() query: HistoryLimitQueryDto) {
    return this.historyService.getRecentSessions(query.limit);
  }

  @Get(':id/attempts')
  attempts(@Param('id', ParseIntPipe) id: number) {
    return this.historyService.getAttemptsForSession(id);
  }
}
