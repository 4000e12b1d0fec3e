import { AppError, type ErrorCode } from '../../src/utils/AppError';

describe('AppError', () => {
  it.each<[string, AppError, number, ErrorCode, boolean]>([
    ['badRequest', AppError.badRequest('Malformed JSON body'), 400, 'BAD_REQUEST', true],
    ['validation', AppError.validation('amount must be greater than 0'), 400, 'VALIDATION_ERROR', true],
    ['unauthorized', AppError.unauthorized(), 401, 'UNAUTHORIZED', true],
    ['forbidden', AppError.forbidden(), 403, 'FORBIDDEN', true],
    ['notFound', AppError.notFound('Tenant not found: 9'), 404, 'NOT_FOUND', true],
    ['conflict', AppError.conflict('Idempotency key reused with different payload'), 409, 'CONFLICT', true],
    ['payloadTooLarge', AppError.payloadTooLarge(), 413, 'PAYLOAD_TOO_LARGE', true],
    ['tooManyRequests', AppError.tooManyRequests(), 429, 'TOO_MANY_REQUESTS', true],
    ['persistence', AppError.persistence(), 500, 'PERSISTENCE_ERROR', false],
    ['internal', AppError.internal(), 500, 'INTERNAL_ERROR', false],
  ])('%s maps to %i %s', (_factory, error, statusCode, code, isOperational) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ statusCode, code, isOperational });
  });

  it('should keep caller messages and fall back to defaults', () => {
    expect(AppError.notFound('Match not found or already processed').message).toBe(
      'Match not found or already processed'
    );
    expect(AppError.notFound().message).toBe('Resource not found');
    expect(AppError.persistence('Failed to confirm match').message).toBe('Failed to confirm match');
    expect(AppError.persistence().message).toBe('Failed to persist changes');
  });

  it('should surface through a rejected service call', async () => {
    const failing = async (): Promise<never> => {
      throw AppError.conflict('Invoice number already exists: INV-1');
    };

    await expect(failing()).rejects.toMatchObject({
      statusCode: 409,
      code: 'CONFLICT',
      message: 'Invoice number already exists: INV-1',
    });
  });

  it('should record where it was raised', () => {
    expect(AppError.internal().stack).toContain('AppError.test.ts');
  });
});
