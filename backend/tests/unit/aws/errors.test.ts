import { describe, it, expect } from 'vitest';
import { classifyAwsError, isNotFoundError, isTransientAwsError } from '../../../src/integrations/aws/errors.js';
import { TransientApiError } from '../../../src/lib/reclamation/errors.js';

function awsError(name: string, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(name), { name }, extra);
}

describe('isNotFoundError', () => {
  it('matches EC2 NotFound codes and ResourceNotFoundException', () => {
    expect(isNotFoundError(awsError('InvalidAllocationID.NotFound'))).toBe(true);
    expect(isNotFoundError(awsError('InvalidSnapshot.NotFound'))).toBe(true);
    expect(isNotFoundError(awsError('ResourceNotFoundException'))).toBe(true);
    expect(isNotFoundError(awsError('AccessDenied'))).toBe(false);
    expect(isNotFoundError('InvalidVolume.NotFound')).toBe(false);
  });
});

describe('isTransientAwsError', () => {
  it('treats throttling, retryable and server errors as transient', () => {
    expect(isTransientAwsError(awsError('ThrottlingException'))).toBe(true);
    expect(isTransientAwsError(awsError('Anything', { $retryable: { throttling: false } }))).toBe(true);
    expect(isTransientAwsError(awsError('InternalError', { $metadata: { httpStatusCode: 503 } }))).toBe(true);
    expect(isTransientAwsError(awsError('TooBusy', { $metadata: { httpStatusCode: 429 } }))).toBe(true);
  });

  it('treats client errors as permanent', () => {
    expect(isTransientAwsError(awsError('ValidationException', { $metadata: { httpStatusCode: 400 } }))).toBe(false);
    expect(isTransientAwsError(awsError('UnauthorizedOperation'))).toBe(false);
    expect(isTransientAwsError(undefined)).toBe(false);
  });
});

describe('classifyAwsError', () => {
  it('wraps transient errors and keeps the cause', () => {
    const cause = awsError('RequestLimitExceeded');
    const wrapped = classifyAwsError(cause, 'DescribeVolumes');

    expect(wrapped).toBeInstanceOf(TransientApiError);
    expect(wrapped).toMatchObject({
      message: 'DescribeVolumes failed transiently (RequestLimitExceeded: RequestLimitExceeded)',
      cause,
    });
  });

  it('returns permanent errors as they are', () => {
    const permanent = awsError('UnauthorizedOperation');
    expect(classifyAwsError(permanent, 'DescribeVolumes')).toBe(permanent);
  });
});
