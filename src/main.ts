import 'reflect-metadata';
import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AnalysisQueueService } from './analysis/analysis-queue.service';
import { BackendRegistry } from './backends/backend-registry';
import { describeError } from './common/errors';
import { AppModule } from './app.module';
import { BackendMetricsService } from './metrics/backend-metrics.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
  app.enableShutdownHooks();

  const registry = app.get(BackendRegistry);
  const health = await registry.healthCheckAll();
  logger.log(`Backend health: ${JSON.stringify(health)}`);

  const content = process.argv.slice(2).join(' ').trim();
  if (!content) {
    logger.warn('Usage: thought-analysis-backend <thought text>');
    await app.close();
    return;
  }

  const queue = app.get(AnalysisQueueService);
  const accepted = queue.enqueue({
    thought: { id: randomUUID(), userId: 'cli', content, tags: [] },
  });
  if (!accepted) {
    logger.error('Analysis queue rejected the thought');
  }

  await queue.whenIdle();
  logger.log(`Backend stats: ${JSON.stringify(app.get(BackendMetricsService).getAllStats())}`);
  await app.close();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Startup failed: ${describeError(error)}`);
  process.exitCode = 1;
});
