import { fetch, type Dispatcher } from 'undici';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { DeployerConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import type { ChatMessage, LlmClient } from '../core/types.js';

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() })
      })
    )
    .min(1)
});

export interface ChatCompletionsOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
  /** Overrides the global undici dispatcher (tests use a MockAgent). */
  dispatcher?: Dispatcher;
}

/**
 * Client for an OpenAI-compatible `/chat/completions` endpoint. Asks for a
 * JSON object reply. Single attempt per call.
 */
export class ChatCompletionsClient implements LlmClient {
  private readonly url: string;

  constructor(
    private readonly opts: ChatCompletionsOptions,
    private readonly log: Logger
  ) {
    this.url = `${opts.baseUrl.replace(/\/$/, '')}/chat/completions`;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    const started = Date.now();

    try {
      const res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.opts.apiKey}`
        },
        body: JSON.stringify({
          model: this.opts.model,
          messages,
          temperature: this.opts.temperature ?? 0.2,
          response_format: { type: 'json_object' }
        }),
        signal: controller.signal,
        dispatcher: this.opts.dispatcher
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '<no body>');
        throw new Error(`LLM error ${res.status}: ${text.slice(0, 500)}`);
      }

      const parsed = ChatCompletionResponse.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`LLM response has an unexpected shape: ${parsed.error.message}`);
      }
      const content = parsed.data.choices[0].message.content;
      if (!content) {
        throw new Error('LLM response has no message content');
      }

      this.log.debug({ model: this.opts.model, ms: Date.now() - started, chars: content.length }, 'llm reply');
      return content;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(`LLM request aborted after ${this.opts.timeoutMs}ms`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Builds the LLM client from configuration.
 *
 * @throws {ConfigurationError} when LLM_API_KEY is unset
 */
export function createLlmClient(
  cfg: Pick<DeployerConfig, 'LLM_API_KEY' | 'LLM_BASE_URL' | 'LLM_MODEL' | 'LLM_TIMEOUT_MS'>,
  log: Logger
): ChatCompletionsClient {
  if (!cfg.LLM_API_KEY) {
    throw new ConfigurationError('LLM credentials (LLM_API_KEY) are not set');
  }
  return new ChatCompletionsClient(
    {
      baseUrl: cfg.LLM_BASE_URL,
      apiKey: cfg.LLM_API_KEY,
      model: cfg.LLM_MODEL,
      timeoutMs: cfg.LLM_TIMEOUT_MS
    },
    log
  );
}
