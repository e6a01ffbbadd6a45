import {
  apiError,
  createTypedError,
  httpStatusFor,
  idempotencyMismatch,
  internal,
  invalidInput,
  isPasteError,
  lockHeld,
  maskSecret,
  notFound,
  PasteError,
  serviceUnavailable,
  toPasteError,
  tooLarge,
  tooManyRequests,
  unauthorized,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      kind: 'conflict',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.kind).toBe('conflict');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('defaults retryable to false', () => {
    const error = createTypedError({ code: 'TEST', kind: 'internal', message: 'test' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('PasteError exposes kind, code and message', () => {
    const err = invalidInput('invalid name');
    expect(err).toBeInstanceOf(PasteError);
    expect(err).toBeInstanceOf(Error);
    expect(err.kind).toBe('invalid_input');
    expect(err.code).toBe('VALIDATION.INVALID_INPUT');
    expect(err.message).toBe('invalid name');
    expect(isPasteError(err)).toBe(true);
    expect(isPasteError(new Error('plain'))).toBe(false);
  });

  test('lockHeld is a retryable conflict', () => {
    const err = lockHeld();
    expect(err.kind).toBe('conflict');
    expect(err.code).toBe('REPOSITORY.LOCK_HELD');
    expect(err.message).toBe('already running');
    expect(err.typedError.retryable).toBe(true);
  });

  test('idempotencyMismatch is a non-retryable conflict', () => {
    const err = idempotencyMismatch();
    expect(err.kind).toBe('conflict');
    expect(err.message).toBe('idempotency key reuse with different payload');
    expect(err.typedError.retryable).toBe(false);
  });

  test('notFound names the resource and id', () => {
    expect(notFound('paste', 'abc').message).toBe('paste not found: abc');
    expect(notFound('paste').message).toBe('paste not found');
  });

  test('tooLarge records size and limit', () => {
    const err = tooLarge(2048, 1024);
    expect(err.kind).toBe('too_large');
    expect(err.typedError.details).toEqual({ size: 2048, maxBytes: 1024 });
  });

  test('tooManyRequests suggests waiting', () => {
    const err = tooManyRequests(15000, 2);
    expect(err.typedError.retryable).toBe(true);
    expect(err.typedError.details).toEqual({ retryAfterMs: 15000, limit: 2 });
    expect(err.typedError.suggestedFixes).toEqual([
      { type: 'WAIT_AND_RETRY', params: { delayMs: 15000 } },
    ]);
  });

  test('serviceUnavailable carries fixes', () => {
    const err = serviceUnavailable('git is required', [{ type: 'INSTALL_GIT', params: {} }]);
    expect(err.kind).toBe('service_unavailable');
    expect(err.typedError.suggestedFixes.map((f) => f.type)).toEqual(['INSTALL_GIT']);
  });

  test('apiError wraps a typed error', () => {
    const typed = unauthorized('missing or invalid token').typedError;
    expect(apiError(typed)).toEqual({ error: typed });
  });
});

describe('toPasteError', () => {
  test('passes typed errors through', () => {
    const original = notFound('paste', 'x');
    expect(toPasteError(original, 'ctx')).toBe(original);
  });

  test('wraps unknown failures as internal with context', () => {
    const err = toPasteError(new Error('EACCES: permission denied'), 'write paste draft');
    expect(err.kind).toBe('internal');
    expect(err.message).toBe('write paste draft: EACCES: permission denied');
  });

  test('wraps non-Error values', () => {
    expect(toPasteError('boom', 'ctx').message).toBe('ctx: boom');
  });
});

describe('httpStatusFor', () => {
  test('maps every kind to its status', () => {
    expect(httpStatusFor('invalid_input')).toBe(400);
    expect(httpStatusFor('unauthorized')).toBe(401);
    expect(httpStatusFor('forbidden')).toBe(403);
    expect(httpStatusFor('not_found')).toBe(404);
    expect(httpStatusFor('conflict')).toBe(409);
    expect(httpStatusFor('too_large')).toBe(413);
    expect(httpStatusFor('too_many_requests')).toBe(429);
    expect(httpStatusFor('internal')).toBe(500);
    expect(httpStatusFor('service_unavailable')).toBe(503);
  });

  test('internal errors map to 500', () => {
    expect(httpStatusFor(internal('x').kind)).toBe(500);
  });
});

describe('maskSecret', () => {
  it('masks all but last 4 characters for long secrets', () => {
    const secret = 'test-secret-value';
    expect(maskSecret(secret)).toBe('*'.repeat(secret.length - 4) + 'alue');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });

  it('preserves last 4 characters for 8-character secrets', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });
});
