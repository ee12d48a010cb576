/**
 * Shared types for the query engine
 */

/**
 * Terminal classification of a job
 */
export type ResultClass = 'NOTHING' | 'SOMETHING' | 'NO_ACCESS' | 'ERROR';

export type JobState = ResultClass | 'PENDING';

/**
 * Result classes in persisted (and display) order
 */
export const RESULT_CLASSES: readonly ResultClass[] = ['NOTHING', 'SOMETHING', 'NO_ACCESS', 'ERROR'];

/**
 * Failure modes an API invocation can end in. Computed once at the SDK
 * boundary and never re-derived from the raw error.
 */
export type ErrorKind =
  | 'access_denied'
  | 'not_subscribed'
  | 'unsupported_region'
  | 'not_found'
  | 'throttling'
  | 'validation'
  | 'transport'
  | 'unknown';

export interface InvocationError {
  kind: ErrorKind;
  code: string;
  message: string;
}

/**
 * Response body with SDK bookkeeping still attached
 */
export type ResponsePayload = Record<string, unknown>;

/**
 * Outcome of invoking one listing operation, all pages drained
 */
export type InvocationOutcome =
  | { ok: true; response: ResponsePayload; pages: number }
  | { ok: false; error: InvocationError };

/**
 * What the classifier hands to the aggregator
 */
export interface Classification {
  resultClass: ResultClass;
  /** Field names with content on success, error description on failure */
  payload: string[];
}

/**
 * One operation call as seen by an executor
 */
export interface OperationCall {
  service: string;
  region: string;
  operation: string;
  params: Record<string, unknown>;
  profile?: string;
}

/**
 * Invokes one operation and reports the outcome; never throws for API
 * failures, those come back as `{ ok: false }`
 */
export interface OperationExecutor {
  execute(call: OperationCall): Promise<InvocationOutcome>;
}
