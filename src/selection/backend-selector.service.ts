import { Injectable, Logger } from '@nestjs/common';
import { AnalysisRequest } from '../backends/analysis-request';
import { BackendName } from '../backends/constants/backend.constants';
import { BackendSelectionError } from '../common/errors';
import { ConfigService } from '../config/config.service';
import { BackendChoice, BackendRole, Plan } from './selection.interface';

/**
 * Turns a request into an ordered Plan of backends. Depends only on the
 * request and the startup configuration.
 */
@Injectable()
export class BackendSelectorService {
  private readonly logger = new Logger(BackendSelectorService.name);

  constructor(private readonly config: ConfigService) {}

  select(request: AnalysisRequest): Plan {
    const { primary: configuredPrimary, secondary: configuredSecondary } = this.config.backends;
    const available = new Set(request.availableBackends);

    const primaryName = available.has(configuredPrimary)
      ? configuredPrimary
      : configuredSecondary && available.has(configuredSecondary)
        ? configuredSecondary
        : undefined;

    if (!primaryName) {
      throw new BackendSelectionError(
        `No backends available from config (primary=${configuredPrimary}, ` +
          `secondary=${configuredSecondary ?? 'none'}, available=[${request.availableBackends.join(', ')}])`,
        request.requestId,
      );
    }

    const primary = this.choice(primaryName, 'primary');
    const fallback =
      primaryName === configuredPrimary &&
      configuredSecondary &&
      configuredSecondary !== configuredPrimary &&
      available.has(configuredSecondary)
        ? this.choice(configuredSecondary, 'fallback')
        : undefined;

    const candidates: Plan['candidates'] = fallback ? [primary, fallback] : [primary];
    const plan: Plan = {
      requestId: request.requestId,
      decisionType: 'SEQUENTIAL',
      candidates: Object.freeze(candidates),
      rationale: buildRationale(request, primary, fallback),
    };

    this.logger.log(`[${request.requestId}] ${plan.decisionType} - ${plan.rationale}`);
    return Object.freeze(plan);
  }

  private choice(name: BackendName, role: BackendRole): BackendChoice {
    return Object.freeze({ name, role, timeoutSeconds: this.config.backends.timeoutSeconds[name] });
  }
}

function buildRationale(request: AnalysisRequest, primary: BackendChoice, fallback?: BackendChoice): string {
  const rationale = fallback
    ? `SEQUENTIAL strategy: ${primary.name} primary (configured), ${fallback.name} fallback (configured). ` +
      `Will try ${primary.name} first, fall back to ${fallback.name} on recoverable errors.`
    : `SEQUENTIAL strategy: ${primary.name} primary (configured), no fallback available. ` +
      `Will fail if ${primary.name} encounters errors.`;

  const hints: string[] = [];
  if (request.preferences?.preferLocal) {
    hints.push('preferLocal');
  }
  if (request.preferences?.maxLatencyMs !== undefined) {
    hints.push(`maxLatencyMs=${request.preferences.maxLatencyMs}`);
  }
  return hints.length > 0 ? `${rationale} Preferences noted, order unchanged: ${hints.join(', ')}.` : rationale;
}
