import type { WorkflowPhase } from './types.js';

export type ActionErrorReason =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'SCAN_EXECUTION_FAILED'
  | 'RESULT_RETRIEVAL_FAILED'
  | 'SIGNING_FAILED'
  | 'PAYLOAD_SERIALIZATION_FAILED'
  | 'ENDPOINT_INVALID'
  | 'REQUEST_INVALID'
  | 'PUBLISH_NETWORK_ERROR'
  | 'PUBLISH_TIMEOUT'
  | 'PUBLISH_REJECTED';

export class ActionError extends Error {
  readonly reason: ActionErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(
    reason: ActionErrorReason,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ActionError';
    this.reason = reason;
    this.details = options.details;
  }
}

const PHASE_DESCRIPTIONS: Record<WorkflowPhase, string> = {
  scan: 'error during command execution',
  'json-scan': 'error generating json scorecard results',
  sign: 'error signing scorecard json results',
  publish: 'error processing signature'
};

/** A phase failure as seen by the top-level driver. */
export class WorkflowError extends Error {
  readonly phase: WorkflowPhase;

  constructor(phase: WorkflowPhase, cause: unknown) {
    super(`${PHASE_DESCRIPTIONS[phase]}: ${errorMessage(cause)}`, { cause });
    this.name = 'WorkflowError';
    this.phase = phase;
  }

  get reason(): ActionErrorReason | undefined {
    return this.cause instanceof ActionError ? this.cause.reason : undefined;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
