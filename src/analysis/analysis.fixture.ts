import { BackendRegistry } from '../backends/backend-registry';
import { AnalysisBackend } from '../backends/backend.interface';
import { BackendName } from '../backends/constants/backend.constants';
import { ClassifierService } from '../classifier/classifier.service';
import { createTestConfig, TestConfigOverrides } from '../config/config.fixture';
import { ConfigService } from '../config/config.service';
import { BackendOrchestratorService } from '../orchestrator/backend-orchestrator.service';
import { BackendSelectorService } from '../selection/backend-selector.service';
import { ThoughtAnalyzerService } from './thought-analyzer.service';
import { Thought } from './thought.interface';

export interface AnalysisHarness {
  config: ConfigService;
  registry: BackendRegistry;
  orchestrator: BackendOrchestratorService;
  analyzer: ThoughtAnalyzerService;
}

/** Wires the analysis stack around the given backends, with no Nest container. */
export function createAnalysisHarness(
  backends: AnalysisBackend[],
  overrides: TestConfigOverrides = {},
): AnalysisHarness {
  const config = createTestConfig(overrides);
  const registry = new BackendRegistry(
    new Map(backends.map((backend): [BackendName, AnalysisBackend] => [backend.name, backend])),
  );
  const orchestrator = new BackendOrchestratorService(
    registry,
    new BackendSelectorService(config),
    new ClassifierService(),
    config,
  );
  return { config, registry, orchestrator, analyzer: new ThoughtAnalyzerService(orchestrator, registry) };
}

export function thought(id: string, content = 'I should improve my email workflow'): Thought {
  return { id, userId: 'user-1', content, tags: ['inbox'] };
}
