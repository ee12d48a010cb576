import { describe, it, expect } from 'vitest';
import { describeAwsError, extractErrorCode, isThrottlingError } from '../errors';

function sdkError(name: string, message: string, httpStatusCode?: number): Error {
  return Object.assign(new Error(message), {
    name,
    $metadata: httpStatusCode === undefined ? {} : { httpStatusCode },
  });
}

describe('extractErrorCode', () => {
  it('prefers the SDK exception name', () => {
    expect(extractErrorCode(sdkError('AccessDeniedException', 'nope'))).toBe('AccessDeniedException');
  });

  it('falls back to the node error code for plain errors', () => {
    const err = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    expect(extractErrorCode(err)).toBe('ECONNRESET');
  });

  it('returns Error for non-objects', () => {
    expect(extractErrorCode('boom')).toBe('Error');
  });
});

describe('describeAwsError', () => {
  it('classifies access denied by code', () => {
    const result = describeAwsError(
      sdkError('AccessDenied', 'User is not allowed to list buckets', 403)
    );
    expect(result).toEqual({
      kind: 'access_denied',
      code: 'AccessDenied',
      message: 'User is not allowed to list buckets',
    });
  });

  it('classifies HTTP 403 as access denied', () => {
    expect(describeAwsError(sdkError('SomeServiceException', 'forbidden', 403)).kind).toBe('access_denied');
  });

  it('classifies EC2 UnauthorizedOperation as access denied', () => {
    expect(describeAwsError(sdkError('UnauthorizedOperation', 'You are not authorized')).kind).toBe(
      'access_denied'
    );
  });

  it('classifies region availability messages as unsupported region', () => {
    const result = describeAwsError(
      sdkError('BadRequestException', 'The operation is not supported in this region', 400)
    );
    expect(result.kind).toBe('unsupported_region');
  });

  it('treats an invalid token in an opt-in region as unsupported region', () => {
    const result = describeAwsError(
      sdkError('UnrecognizedClientException', 'The security token included in the request is invalid.', 400)
    );
    expect(result.kind).toBe('unsupported_region');
  });

  it('classifies missing subscriptions', () => {
    expect(describeAwsError(sdkError('OptInRequired', 'You are not subscribed to this service')).kind).toBe(
      'not_subscribed'
    );
    expect(
      describeAwsError(sdkError('SubscriptionRequiredException', 'AWS Premium Support Subscription is required'))
        .kind
    ).toBe('not_subscribed');
  });

  it('classifies throttling by code, status and message', () => {
    expect(describeAwsError(sdkError('ThrottlingException', 'Rate exceeded', 400)).kind).toBe('throttling');
    expect(describeAwsError(sdkError('SomeServiceException', 'slow down', 429)).kind).toBe('throttling');
    expect(describeAwsError(sdkError('Throttling', 'Rate exceeded')).kind).toBe('throttling');
  });

  it('classifies validation errors', () => {
    const result = describeAwsError(sdkError('ValidationException', '1 validation error detected', 400));
    expect(result).toEqual({
      kind: 'validation',
      code: 'ValidationException',
      message: '1 validation error detected',
    });
  });

  it('classifies missing entities as not found', () => {
    expect(describeAwsError(sdkError('NoSuchEntity', 'The Password Policy cannot be found.', 404)).kind).toBe(
      'not_found'
    );
  });

  it('classifies a missing default ecs cluster as not found', () => {
    expect(describeAwsError(sdkError('ClusterNotFoundException', 'Cluster not found.', 400))).toEqual({
      kind: 'not_found',
      code: 'ClusterNotFoundException',
      message: 'Cluster not found.',
    });
  });

  it('classifies network failures as transport errors', () => {
    const err = Object.assign(new Error('getaddrinfo ENOTFOUND ec2.xx-west-9.amazonaws.com'), {
      code: 'ENOTFOUND',
    });
    expect(describeAwsError(err)).toEqual({
      kind: 'transport',
      code: 'ENOTFOUND',
      message: 'getaddrinfo ENOTFOUND ec2.xx-west-9.amazonaws.com',
    });
  });

  it('falls back to unknown', () => {
    expect(describeAwsError(new Error('Failed to import @aws-sdk/client-foo'))).toEqual({
      kind: 'unknown',
      code: 'Error',
      message: 'Failed to import @aws-sdk/client-foo',
    });
    expect(describeAwsError('boom')).toEqual({ kind: 'unknown', code: 'Error', message: 'boom' });
  });
});

describe('isThrottlingError', () => {
  it('only matches throttling', () => {
    expect(isThrottlingError(sdkError('TooManyRequestsException', 'Too many requests'))).toBe(true);
    expect(isThrottlingError(sdkError('AccessDeniedException', 'denied'))).toBe(false);
  });
});
