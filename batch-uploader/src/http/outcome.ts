export type FailureReason =
  | 'unknown'
  | 'invalid_response'
  | 'unexpected_code'
  | 'server_limited'
  | 'server_rejected'
  | 'failed_to_open_batch';

export interface DeliverySuccess {
  readonly kind: 'success';
  readonly statusCode: number;
}

export interface DeliveryFailure {
  readonly kind: 'retriable' | 'terminal';
  readonly reason: FailureReason;
  readonly statusCode?: number;
  readonly error?: Error;
}

export type DeliveryOutcome = DeliverySuccess | DeliveryFailure;

export function success(statusCode: number): DeliveryOutcome {
  const outcome: DeliverySuccess = { kind: 'success', statusCode };
  return Object.freeze(outcome);
}

export function retriable(reason: FailureReason, details: { statusCode?: number; error?: Error } = {}): DeliveryOutcome {
  const outcome: DeliveryFailure = { kind: 'retriable', reason, ...details };
  return Object.freeze(outcome);
}

export function terminal(reason: FailureReason, details: { statusCode?: number; error?: Error } = {}): DeliveryOutcome {
  const outcome: DeliveryFailure = { kind: 'terminal', reason, ...details };
  return Object.freeze(outcome);
}

/**
 * Decide what happens to a batch after one upload attempt. Checked in
 * order: transport error, missing status, 1-299, 300-399, 429, 400,
 * everything else.
 */
export function classifyResponse(statusCode: number | undefined, error: Error | undefined): DeliveryOutcome {
  if (error) {
    return retriable('unknown', { statusCode, error });
  }
  if (statusCode === undefined || statusCode < 1) {
    return retriable('invalid_response', { statusCode });
  }
  if (statusCode < 300) {
    return success(statusCode);
  }
  if (statusCode < 400) {
    return retriable('unexpected_code', { statusCode });
  }
  if (statusCode === 429) {
    return retriable('server_limited', { statusCode });
  }
  if (statusCode === 400) {
    // The payload itself was refused; sending it again cannot help.
    return terminal('unexpected_code', { statusCode });
  }
  return terminal('server_rejected', { statusCode });
}

/** Success and terminal failures both end the batch's life on disk. */
export function shouldRemoveBatch(outcome: DeliveryOutcome): boolean {
  return outcome.kind !== 'retriable';
}
