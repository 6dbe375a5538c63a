/**
 * Pipeline error taxonomy.
 *
 * Gateway clients throw TransientGatewayError / PermanentGatewayError; the
 * orchestrator is the only place that decides between retry and dead-letter.
 */

import type { Order } from './types/models.js';

export type GatewayName = 'intent' | 'vision' | 'order' | 'notification';

export class ValidationError extends Error {
  readonly name = 'ValidationError';

  constructor(
    message: string,
    readonly issues: { path: string; message: string }[] = []
  ) {
    super(message);
  }
}

export class QueueUnavailableError extends Error {
  readonly name = 'QueueUnavailableError';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class TransientGatewayError extends Error {
  readonly name = 'TransientGatewayError';

  constructor(
    readonly gateway: GatewayName,
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export class PermanentGatewayError extends Error {
  readonly name = 'PermanentGatewayError';

  constructor(
    readonly gateway: GatewayName,
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export class RetryExhaustedError extends Error {
  readonly name = 'RetryExhaustedError';

  constructor(
    readonly attempts: number,
    readonly lastError: TransientGatewayError
  ) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`);
  }
}

/**
 * Raised when the traceability store already links the comment to an order.
 * The orchestrator treats it as a successful, idempotent no-op.
 */
export class DuplicateOrderAttempt extends Error {
  readonly name = 'DuplicateOrderAttempt';

  constructor(readonly commentId: string, readonly order: Order) {
    super(`Comment ${commentId} already produced order ${order.orderId}`);
  }
}

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError';

  constructor(readonly stage: string, readonly event: string) {
    super(`Event "${event}" is not valid in stage "${stage}"`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
