import type { Logger } from 'pino';
import { CallbackDeliveryError, toError } from '../errors.js';
import type { CallbackOutcome, CallbackPayload, ResultNotifier } from '../types.js';
import { type BaseService, sleep } from './base.js';

/**
 * Sends one POST and reports the response status. Throws on transport failure.
 */
export interface CallbackTransport {
  post(url: string, body: CallbackPayload, timeoutMs: number): Promise<number>;
}

export interface RetryPolicy {
  /** Attempts in total, the first one included. */
  maxAttempts: number;
  /** Delay before the first retry; doubles before each further retry. */
  baseDelayMs: number;
  /** Per-attempt timeout handed to the transport. */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  baseDelayMs: 1000,
  timeoutMs: 600_000
};

/**
 * Delay before `attempt` (1-based). No delay before the first attempt, then
 * base, 2×base, 4×base…
 */
export function retryDelay(attempt: number, baseDelayMs: number): number {
  if (attempt <= 1) return 0;
  return baseDelayMs * 2 ** (attempt - 2);
}

/**
 * Callback Notifier - delivers the result payload to the caller's
 * evaluation URL with bounded exponential backoff.
 *
 * Only HTTP 200 counts as delivered. Exhausting the attempts is logged as a
 * {@link CallbackDeliveryError}; `notify` itself never rejects.
 */
export class CallbackNotifier implements BaseService, ResultNotifier {
  constructor(
    private readonly transport: CallbackTransport,
    public readonly log: Logger,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async notify(url: string, payload: CallbackPayload): Promise<CallbackOutcome> {
    const outcome: CallbackOutcome = { delivered: false, attempts: 0 };

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      const delay = retryDelay(attempt, this.policy.baseDelayMs);
      if (delay > 0) await this.wait(delay);

      outcome.attempts = attempt;
      try {
        const status = await this.transport.post(url, payload, this.policy.timeoutMs);
        outcome.lastStatus = status;
        outcome.lastError = undefined;
        if (status === 200) {
          outcome.delivered = true;
          this.log.info({ url, attempt, status }, 'callback delivered');
          return outcome;
        }
        this.log.warn({ url, attempt, status }, 'callback rejected');
      } catch (err) {
        const error = toError(err);
        outcome.lastStatus = undefined;
        outcome.lastError = error.message;
        this.log.warn({ url, attempt, err: error }, 'callback request failed');
      }
    }

    const failure = new CallbackDeliveryError(url, outcome.attempts, {
      cause: outcome.lastError ?? `Unexpected status ${outcome.lastStatus}`
    });
    this.log.error(
      { err: failure, url, attempts: outcome.attempts, lastStatus: outcome.lastStatus },
      'callback delivery gave up'
    );
    return outcome;
  }
}
