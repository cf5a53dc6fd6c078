export type UnsubscribeResult = 'Success' | 'Failed' | 'ManualRequired';

export type UnsubscribeState = 'Locating' | 'Executing' | UnsubscribeResult;

export interface UnsubscribeSelection {
  row: number;
  domain: string;
  token: string;
  unsubscribeUrl: string;
  delete: boolean;
  unsubscribeAvailable: boolean;
}

export interface UnsubscribeOutcome {
  domain: string;
  token: string;
  attemptedAt: Date;
  result: UnsubscribeResult;
  detail: string;
  attempts: number;
}

export interface OutcomeSink {
  append(outcome: UnsubscribeOutcome): Promise<void>;
}

export interface UnsubscribeRunResult {
  outcomes: UnsubscribeOutcome[];
  skipped: number;
  cancelled: boolean;
}

export interface UnsubscribeExecutorConfig {
  readonly lookbackDays: number;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffMs: number;
}
