import { Module } from '@nestjs/common';
import { AnalysisModule } from './analysis/analysis.module';
import { BackendsModule } from './backends/backends.module';
import { ClassifierModule } from './classifier/classifier.module';
import { ConfigModule } from './config/config.module';
import { MetricsModule } from './metrics/metrics.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { SelectionModule } from './selection/selection.module';
import { VaultModule } from './vault/vault.module';

@Module({
  imports: [
    VaultModule,
    ConfigModule,
    BackendsModule,
    ClassifierModule,
    SelectionModule,
    OrchestratorModule,
    MetricsModule,
    AnalysisModule,
  ],
})
export class AppModule {}
