import { AnalysisRequest } from './analysis-request';
import { AnalysisResult } from './analysis-result.interface';
import { BackendName } from './constants/backend.constants';

/**
 * Uniform capability over one reasoning provider.
 *
 * `analyze` never rejects: every provider fault comes back as a failure
 * carrying one error kind. Implementations bound their own work to
 * `timeoutSeconds` and honour `signal`.
 */
export interface AnalysisBackend {
  readonly name: BackendName;
  analyze(request: AnalysisRequest, timeoutSeconds: number, signal?: AbortSignal): Promise<AnalysisResult>;
  healthCheck(): Promise<boolean>;
}
