import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { WorkerModule } from './worker.module';
import { PatternStatsService } from './services/pattern-stats.service';
import { PATTERN_REPOSITORY } from './repositories/pattern.repository';
import type { PatternRepository } from './repositories/pattern.repository';

/**
 * Bootstrap the price worker application context
 */
async function bootstrap() {
  const logger = new Logger('WorkerBootstrap');

  try {
    // Create NestJS application context (no HTTP server)
    const app = await NestFactory.createApplicationContext(WorkerModule, {
      logger: ['log', 'error', 'warn', 'debug', 'verbose'],
    });

    // Enable graceful shutdown hooks
    app.enableShutdownHooks();

    const patterns = app.get<PatternRepository>(PATTERN_REPOSITORY);
    const stats = app.get(PatternStatsService);
    const domains = await patterns.listDomains();

    logger.log(`Pricewatch worker started with ${domains.length} patterns`);
    for (const domain of domains) {
      const report = await stats.getHealth(domain);
      if (report) {
        logger.log(`   - ${domain}: ${report.health} (${report.successfulAttempts}/${report.totalAttempts})`);
      }
    }
  } catch (error) {
    logger.error('Failed to start worker:', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();
