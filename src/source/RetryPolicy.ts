export type FailureClass = 'transient' | 'terminal';

export type RetryPolicyResult = {
  failureClass: FailureClass;
  retryRecommended: boolean;
  failureCode: string;
  reason: string;
};

type ClassifyInput = {
  status?: number;
  /** Error thrown by fetch itself (DNS, connection reset, ...) */
  networkError?: unknown;
};

export function classifyFetchFailure(input: ClassifyInput): RetryPolicyResult {
  const { status } = input;

  if (input.networkError !== undefined) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'NETWORK_ERROR', reason: 'network_error' };
  }
  if (status === 429) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'RATE_LIMITED', reason: 'rate_limited' };
  }
  if (typeof status === 'number' && status >= 500) {
    return { failureClass: 'transient', retryRecommended: true, failureCode: 'UPSTREAM_ERROR', reason: 'upstream_error' };
  }
  if (status === 401 || status === 403) {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'FORBIDDEN', reason: 'missing_or_invalid_api_key' };
  }
  if (status === 404) {
    return { failureClass: 'terminal', retryRecommended: false, failureCode: 'NOT_FOUND', reason: 'library_not_found' };
  }
  return { failureClass: 'terminal', retryRecommended: false, failureCode: 'HTTP_ERROR', reason: 'unexpected_status' };
}

/**
 * Delay before the next attempt: the server's Retry-After or Backoff
 * header when present, otherwise exponential backoff.
 */
export function retryDelayMs(attempt: number, baseMs: number, headers?: Headers): number {
  const hinted = headers?.get('retry-after') ?? headers?.get('backoff');
  if (hinted) {
    const seconds = Number.parseFloat(hinted);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }
  return baseMs * 2 ** attempt;
}
