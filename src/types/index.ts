export interface Configuration {
  intervalMs: number;
  endpoints: readonly string[];
}

export interface CallSuccess {
  ok: true;
  url: string;
  status: string; // e.g. "200 OK"
  statusCode: number;
  bodyBytes: number;
  durationMs: number;
}

export interface CallFailure {
  ok: false;
  url: string;
  stage: 'request' | 'read';
  errorMessage: string;
  durationMs: number;
}

export type CallOutcome = CallSuccess | CallFailure;

export interface RoundSummary {
  round: number;
  outcomes: CallOutcome[];
  succeeded: number;
  failed: number;
  durationMs: number;
}
