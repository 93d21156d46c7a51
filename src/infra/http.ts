import { fetch, type Dispatcher } from 'undici';
import type { CallbackTransport } from '../core/domain/notifier.js';
import type { CallbackPayload } from '../core/types.js';

/**
 * Posts callback payloads with undici. The response body is drained and
 * ignored; only the status matters.
 */
export class UndiciCallbackTransport implements CallbackTransport {
  constructor(private readonly dispatcher?: Dispatcher) {}

  async post(url: string, body: CallbackPayload, timeoutMs: number): Promise<number> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
        dispatcher: this.dispatcher
      });
      await res.arrayBuffer().catch(() => undefined);
      return res.status;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(`Callback request aborted after ${timeoutMs}ms`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
