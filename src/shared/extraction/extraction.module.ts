import { Module } from '@nestjs/common';
import { PaginationService } from './services/pagination.service';
import { LevelStrategyService } from './services/level-strategy.service';

@Module({
  providers: [PaginationService, LevelStrategyService],
  exports: [PaginationService, LevelStrategyService],
})
export class ExtractionModule {}
