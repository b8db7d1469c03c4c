import { describe, expect, it } from 'vitest';
import { RerouteError, type RerouteErrorCode, type RerouteFailureType } from './RerouteError.js';

describe('RerouteError', () => {
  it.each<[RerouteFailureType, RerouteErrorCode]>([
    ['cancelled', 'CANCELLED'],
    ['no-provider', 'NO_PROVIDER'],
    ['invalid-request', 'INVALID_RESPONSE'],
    ['empty-result', 'PROVIDER_EMPTY_RESULT'],
    ['router-error', 'PROVIDER_ERROR'],
    ['unknown', 'PROVIDER_ERROR'],
  ])('maps engine failure type %s to %s', (type, code) => {
    const error = RerouteError.fromFailureType(type, 'engine message');

    expect(error.code).toBe(code);
    expect(error.message).toBe('engine message');
  });

  it('is an Error carrying its details', () => {
    const error = RerouteError.providerError('Directions API request failed: 503', { status: 503 });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RerouteError');
    expect(error.details).toEqual({ status: 503 });
  });
});
