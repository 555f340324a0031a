import { Module } from '@nestjs/common';
import { HistoryController } from './history.controller';
import { HistoryService } from './history.service';
import { SessionsController } from './sessions.controller';

@Module({
  controllers: [SessionsController, HistoryController],
  providers: [HistoryService],
  exports: [HistoryService],
})
export class HistoryModule {}
