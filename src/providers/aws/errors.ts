/**
 * AWS error classification
 *
 * Maps whatever the SDK (or the network stack underneath it) throws onto a
 * fixed set of error kinds. This is the only place raw errors are inspected.
 */

import type { ErrorKind, InvocationError } from '../../query/types';

const ACCESS_DENIED_CODES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'AuthFailure',
  'AuthorizationError',
  'AuthorizationErrorException',
  'ForbiddenException',
  'InvalidClientTokenId',
  'NotAuthorized',
  'UnauthorizedException',
  'UnauthorizedOperation',
  'UnrecognizedClientException',
]);

const NOT_SUBSCRIBED_CODES = new Set([
  'NotSubscribedException',
  'OptInRequired',
  'SubscriptionRequiredException',
]);

const UNSUPPORTED_REGION_CODES = new Set([
  'InvalidAction',
  'UnknownOperationException',
  'UnsupportedOperation',
]);

const NOT_FOUND_CODES = new Set([
  // ecs operations fall back to the `default` cluster, which may not exist
  'ClusterNotFoundException',
  'NoSuchBucket',
  'NoSuchEntity',
  'NotFoundException',
  'ResourceNotFoundException',
]);

const THROTTLING_CODES = new Set([
  'BandwidthLimitExceeded',
  'EC2ThrottledException',
  'PriorRequestNotComplete',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'RequestThrottledException',
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
]);

const VALIDATION_CODES = new Set([
  'InvalidParameterCombination',
  'InvalidParameterException',
  'InvalidParameterValue',
  'InvalidParameterValueException',
  'InvalidRequestException',
  'MissingParameter',
  'SerializationException',
  'ValidationError',
  'ValidationException',
]);

const TRANSPORT_CODES = new Set([
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EPIPE',
  'ETIMEDOUT',
  'NetworkingError',
  'RequestTimeout',
  'TimeoutError',
]);

// Messages seen from services that are not offered in the called region
const UNSUPPORTED_REGION_PATTERN =
  /not supported in (this|the called) region|not available in this region|Credential should be scoped to a valid region|security token included in the request is invalid|was not able to validate the provided access credentials/i;

// Messages seen when the account lacks a subscription or was never enabled
const NOT_SUBSCRIBED_PATTERN =
  /not subscribed|Subscription is required|administratively disabled|Account not whitelisted|isn't authorized to call this operation/i;

const ACCESS_DENIED_PATTERN = /is not authorized to perform|access denied/i;

const THROTTLING_PATTERN = /rate exceeded|throttl/i;

const TRANSPORT_PATTERN = /socket hang up|getaddrinfo|connect ECONNREFUSED|network error/i;

function readStringField(err: object, field: string): string | undefined {
  const value: unknown = Reflect.get(err, field);
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function readStatusCode(err: object): number | undefined {
  const metadata: unknown = Reflect.get(err, '$metadata');
  if (metadata && typeof metadata === 'object') {
    const status: unknown = Reflect.get(metadata, 'httpStatusCode');
    if (typeof status === 'number') return status;
  }
  return undefined;
}

/**
 * Extract the most specific error code available
 *
 * SDK v3 service exceptions carry their code as `name`; Node system errors
 * carry it as `code` and are named plain `Error`.
 */
export function extractErrorCode(err: unknown): string {
  if (!err || typeof err !== 'object') return 'Error';

  const name = readStringField(err, 'name');
  if (name && name !== 'Error') return name;

  return readStringField(err, 'Code') ?? readStringField(err, 'code') ?? name ?? 'Error';
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || 'Error';
  }
  if (typeof err === 'string') return err;
  if (typeof err === 'number' || typeof err === 'boolean' || typeof err === 'bigint') {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

function resolveKind(code: string, message: string, status: number | undefined): ErrorKind {
  if (THROTTLING_CODES.has(code) || status === 429 || THROTTLING_PATTERN.test(message)) {
    return 'throttling';
  }
  if (UNSUPPORTED_REGION_CODES.has(code) || UNSUPPORTED_REGION_PATTERN.test(message)) {
    return 'unsupported_region';
  }
  if (NOT_SUBSCRIBED_CODES.has(code) || NOT_SUBSCRIBED_PATTERN.test(message)) {
    return 'not_subscribed';
  }
  if (ACCESS_DENIED_CODES.has(code) || status === 403 || ACCESS_DENIED_PATTERN.test(message)) {
    return 'access_denied';
  }
  if (NOT_FOUND_CODES.has(code)) {
    return 'not_found';
  }
  if (VALIDATION_CODES.has(code)) {
    return 'validation';
  }
  if (TRANSPORT_CODES.has(code) || TRANSPORT_PATTERN.test(message)) {
    return 'transport';
  }
  return 'unknown';
}

/**
 * Classify a thrown AWS SDK error
 */
export function describeAwsError(err: unknown): InvocationError {
  const code = extractErrorCode(err);
  const message = formatErrorMessage(err);
  const status = err && typeof err === 'object' ? readStatusCode(err) : undefined;

  return { kind: resolveKind(code, message, status), code, message };
}

/**
 * Whether an error is worth retrying with backoff
 */
export function isThrottlingError(err: unknown): boolean {
  return describeAwsError(err).kind === 'throttling';
}
