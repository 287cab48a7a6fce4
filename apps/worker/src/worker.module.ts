import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { RepositoriesModule } from './repositories/repositories.module';
import { PatternStatsService } from './services/pattern-stats.service';
import { PriceCheckService } from './services/price-check.service';

/**
 * Main worker module
 * Wires the extraction library to the pattern store and price history
 */
@Module({
  imports: [ConfigModule, RepositoriesModule],
  providers: [PatternStatsService, PriceCheckService],
  exports: [PatternStatsService, PriceCheckService],
})
export class WorkerModule {}
