import { Module } from '@nestjs/common';
import { BackendsModule } from '../backends/backends.module';
import { ClassifierModule } from '../classifier/classifier.module';
import { ConfigModule } from '../config/config.module';
import { SelectionModule } from '../selection/selection.module';
import { BackendOrchestratorService } from './backend-orchestrator.service';

@Module({
  imports: [ConfigModule, BackendsModule, ClassifierModule, SelectionModule],
  providers: [BackendOrchestratorService],
  exports: [BackendOrchestratorService],
})
export class OrchestratorModule {}
