/**
 * Backend Guard
 *
 * Runs every durable-backend call through an opossum circuit breaker:
 * - bounded by a timeout, so no call stays pending indefinitely
 * - fails fast while the circuit is open
 * - converts thrown errors into BackendResult failures
 * - keeps command errors from a live server out of the failure statistics
 */

import CircuitBreaker from 'opossum';
import type { Logger } from 'pino';
import type { DurableBackendLabel } from '../../types.js';
import type { BackendFailureKind, BackendGuardConfig, BackendResult } from './types.js';
import { DEFAULT_GUARD_CONFIG, fail, ok } from './types.js';

type GuardedCall = () => Promise<void>;

export type GuardCircuitState = 'closed' | 'open' | 'halfOpen';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Classify a thrown error into a failure kind
 */
export function classifyFailure(error: unknown): BackendFailureKind {
  // ioredis raises ReplyError for error replies from a live server
  if (error instanceof Error && error.name === 'ReplyError') return 'rejected';
  return errorCode(error) === 'ETIMEDOUT' ? 'timeout' : 'unreachable';
}

export class BackendGuard {
  private readonly log: Logger;
  private readonly breaker: CircuitBreaker<[GuardedCall], void>;

  constructor(
    private readonly backend: DurableBackendLabel,
    logger: Logger,
    config: Partial<BackendGuardConfig> = {}
  ) {
    const settings = { ...DEFAULT_GUARD_CONFIG, ...config };
    this.log = logger.child({ component: 'BackendGuard', backend });

    this.breaker = new CircuitBreaker(async (call: GuardedCall) => call(), {
      timeout: settings.timeoutMs,
      errorThresholdPercentage: settings.errorThresholdPercentage,
      resetTimeout: settings.resetTimeoutMs,
      volumeThreshold: settings.volumeThreshold,
      // A refused command is not an outage and must not open the circuit
      errorFilter: (error: unknown) => classifyFailure(error) === 'rejected',
    });

    this.breaker.on('open', () => {
      this.log.warn('Backend circuit breaker OPEN');
    });

    this.breaker.on('halfOpen', () => {
      this.log.info('Backend circuit breaker HALF-OPEN');
    });

    this.breaker.on('close', () => {
      this.log.info('Backend circuit breaker CLOSED');
    });

    this.breaker.on('timeout', () => {
      this.log.warn({ timeoutMs: settings.timeoutMs }, 'Backend call timed out');
    });
  }

  /**
   * Execute a backend call under the guard
   */
  async run<T>(operation: string, call: () => Promise<T>): Promise<BackendResult<T>> {
    const slot: { result?: BackendResult<T> } = {};

    try {
      await this.breaker.fire(async () => {
        slot.result = ok(await call());
      });
    } catch (error) {
      const kind = classifyFailure(error);
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn({ operation, kind, error: message }, 'Backend call failed');
      return fail({ kind, backend: this.backend, message, cause: error });
    }

    return (
      slot.result ??
      fail({
        kind: 'unreachable',
        backend: this.backend,
        message: `${operation} finished without a result`,
      })
    );
  }

  getState(): GuardCircuitState {
    if (this.breaker.opened) return 'open';
    if (this.breaker.halfOpen) return 'halfOpen';
    return 'closed';
  }

  /**
   * Stop the breaker's statistics timers
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}
