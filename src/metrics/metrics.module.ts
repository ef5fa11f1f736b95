import { Module } from '@nestjs/common';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';
import { BackendMetricsService } from './backend-metrics.service';

@Module({
  imports: [OrchestratorModule],
  providers: [BackendMetricsService],
  exports: [BackendMetricsService],
})
export class MetricsModule {}
