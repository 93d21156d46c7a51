import type { BaseLogger, Logger } from 'pino';
import type { SecretVerifier } from '../auth.js';
import {
  GenerationError,
  InternalError,
  PublishError,
  ServiceUnavailableError,
  toError,
  type PipelineStage
} from '../errors.js';
import { targetIdFor } from '../target.js';
import type {
  AppGenerator,
  AppPublisher,
  CallbackPayload,
  GeneratedFileSet,
  PublishResult,
  ResultNotifier,
  TaskAcknowledgement,
  TaskSubmission
} from '../types.js';
import { type BaseService, now } from './base.js';

/**
 * Dependencies of the orchestrator, built once at startup. A dependency that
 * failed to initialize is `null`; submissions then answer 503.
 */
export interface OrchestratorDeps {
  secrets: SecretVerifier;
  generator: AppGenerator | null;
  publisher: AppPublisher | null;
  notifier: ResultNotifier;
  clock?: () => number;
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)} seconds`;
}

/**
 * Request Orchestrator - authenticates a submission, then runs generation,
 * publishing and the result callback strictly in that order.
 *
 * Holds no per-request state; one instance serves concurrent requests.
 *
 * @example
 * ```typescript
 * const orchestrator = new TaskOrchestrator({ secrets, generator, publisher, notifier }, log);
 * const ack = await orchestrator.handle(submission);
 * // ack.commit_url -> 'https://octocat.github.io/llm-app-todo-app-round-0/'
 * ```
 */
export class TaskOrchestrator implements BaseService {
  private readonly clock: () => number;

  constructor(
    private readonly deps: OrchestratorDeps,
    public readonly log: Logger
  ) {
    this.clock = deps.clock ?? now;
  }

  get ready(): { generator: boolean; publisher: boolean } {
    return { generator: this.deps.generator !== null, publisher: this.deps.publisher !== null };
  }

  /**
   * @param requestLog - Logger bound to the HTTP request, so pipeline lines
   *   share its `reqId`. Defaults to the orchestrator's own logger.
   */
  async handle(submission: TaskSubmission, requestLog: BaseLogger = this.log): Promise<TaskAcknowledgement> {
    this.deps.secrets.verify(submission.secret);

    const { generator, publisher } = this.deps;
    if (!generator) {
      throw new ServiceUnavailableError('generator', 'LLM generator not initialized on server');
    }
    if (!publisher) {
      throw new ServiceUnavailableError('publisher', 'GitHub publisher not initialized on server');
    }

    const started = this.clock();
    const targetId = targetIdFor(submission.task, submission.round);
    requestLog.info({ task: submission.task, round: submission.round, targetId }, 'processing submission');

    const files = await this.runStage(requestLog, 'generate', async (): Promise<GeneratedFileSet> => {
      const generated = await generator.generate(submission);
      if (generated.size === 0) {
        throw new GenerationError('LLM failed to generate any files');
      }
      return generated;
    });

    const result = await this.runStage(
      requestLog,
      'publish',
      (): Promise<PublishResult> => publisher.publish(targetId, files)
    );
    const finalUrl = result.siteUrl || result.repositoryUrl;

    const payload: CallbackPayload = {
      email: submission.email,
      task: submission.task,
      round: submission.round,
      nonce: submission.nonce,
      repo_url: result.repositoryUrl,
      commit_sha: result.lastCommitId,
      pages_url: result.siteUrl
    };
    const outcome = await this.deps.notifier.notify(submission.evaluation_url, payload);
    requestLog.info(
      { targetId, delivered: outcome.delivered, attempts: outcome.attempts, hosting: result.hosting },
      'submission complete'
    );

    return {
      status: 'success',
      message: `Code generated and deployed successfully to new repository: ${result.repositoryUrl}`,
      commit_url: finalUrl,
      evaluation_url: submission.evaluation_url,
      time_taken: formatDuration(this.clock() - started)
    };
  }

  private async runStage<T>(log: BaseLogger, stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const cause =
        err instanceof GenerationError || err instanceof PublishError
          ? err
          : stage === 'generate'
            ? new GenerationError(toError(err).message, { cause: err })
            : new PublishError(toError(err).message, { cause: err });
      log.error({ stage, err: cause }, 'submission failed');
      throw new InternalError(stage, cause);
    }
  }
}
