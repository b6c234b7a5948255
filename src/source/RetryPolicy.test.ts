import { describe, it, expect } from 'vitest';
import { classifyFetchFailure, retryDelayMs } from './RetryPolicy.js';

describe('RetryPolicy', () => {
  it('classifies rate limiting and server errors as transient', () => {
    expect(classifyFetchFailure({ status: 429 })).toMatchObject({ failureClass: 'transient', failureCode: 'RATE_LIMITED' });
    expect(classifyFetchFailure({ status: 503 })).toMatchObject({ retryRecommended: true, failureCode: 'UPSTREAM_ERROR' });
    expect(classifyFetchFailure({ networkError: new Error('reset') })).toMatchObject({ failureCode: 'NETWORK_ERROR' });
  });

  it('classifies client errors as terminal', () => {
    expect(classifyFetchFailure({ status: 403 })).toEqual({
      failureClass: 'terminal',
      retryRecommended: false,
      failureCode: 'FORBIDDEN',
      reason: 'missing_or_invalid_api_key',
    });
    expect(classifyFetchFailure({ status: 404 }).failureCode).toBe('NOT_FOUND');
    expect(classifyFetchFailure({ status: 400 }).failureCode).toBe('HTTP_ERROR');
  });

  it('honours server delay hints', () => {
    expect(retryDelayMs(0, 1000, new Headers({ 'Retry-After': '3' }))).toBe(3000);
    expect(retryDelayMs(2, 1000, new Headers({ Backoff: '0.5' }))).toBe(500);
  });

  it('backs off exponentially without hints', () => {
    expect(retryDelayMs(0, 100)).toBe(100);
    expect(retryDelayMs(3, 100, new Headers({ 'Retry-After': 'soon' }))).toBe(800);
  });
});
