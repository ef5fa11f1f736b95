import { BackendName } from '../backends/constants/backend.constants';

/** `parallel` is reserved; the sequential strategy never produces it. */
export type BackendRole = 'primary' | 'fallback' | 'parallel';

export type DecisionType = 'SEQUENTIAL';

export interface BackendChoice {
  readonly name: BackendName;
  readonly role: BackendRole;
  readonly timeoutSeconds: number;
}

export interface Plan {
  readonly requestId: string;
  readonly decisionType: DecisionType;
  readonly candidates: readonly [BackendChoice, ...BackendChoice[]];
  readonly rationale: string;
}
