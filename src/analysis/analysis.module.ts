import { Module } from '@nestjs/common';
import { BackendsModule } from '../backends/backends.module';
import { ConfigModule } from '../config/config.module';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';
import { AnalysisQueueService } from './analysis-queue.service';
import { LoggingResultSink } from './logging-result-sink';
import { ANALYSIS_RESULT_SINK } from './result-sink.interface';
import { ThoughtAnalyzerService } from './thought-analyzer.service';

@Module({
  imports: [ConfigModule, BackendsModule, OrchestratorModule],
  providers: [
    ThoughtAnalyzerService,
    AnalysisQueueService,
    { provide: ANALYSIS_RESULT_SINK, useClass: LoggingResultSink },
  ],
  exports: [ThoughtAnalyzerService, AnalysisQueueService],
})
export class AnalysisModule {}
