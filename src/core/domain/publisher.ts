import type { Logger } from 'pino';
import { PublishConflictError, PublishError, RemoteHostError, toError } from '../errors.js';
import { repositoryNameFor } from '../target.js';
import type {
  AppPublisher,
  GeneratedFileSet,
  HostingStatus,
  PublishResult,
  RemoteFile,
  RemoteRepository,
  RepositoryHost,
  TargetId
} from '../types.js';
import type { BaseService } from './base.js';

export const PUBLISH_BRANCH = 'main';

/**
 * Repository Publisher - puts a generated file set into a public repository
 * and turns on static hosting for it.
 *
 * Publishing is idempotent by convergence: the repository name is derived from
 * the target id, an existing repository is reused, and existing files are
 * updated against their current content hash. Files whose remote content is
 * already identical are not written again. Nothing is rolled back when a later
 * step fails.
 */
export class RepositoryPublisher implements BaseService, AppPublisher {
  constructor(
    private readonly host: RepositoryHost,
    public readonly log: Logger,
    private readonly prefix: string = 'llm-app-'
  ) {}

  async publish(targetId: TargetId, files: GeneratedFileSet): Promise<PublishResult> {
    const name = repositoryNameFor(this.prefix, targetId);
    const repo = await this.ensureRepository(name, targetId);

    const head = await this.checkBranch(repo);

    let lastCommitId = '';
    for (const [path, content] of files) {
      if (content.trim().length === 0) {
        this.log.info({ repo: name, path }, 'skipping empty file');
        continue;
      }
      lastCommitId = (await this.commitFile(repo, targetId, path, content)) ?? lastCommitId;
    }

    if (!lastCommitId) {
      lastCommitId = head ?? '';
      this.log.warn({ repo: name, head: lastCommitId.slice(0, 7) }, 'no files committed');
    }

    const hosting = await this.enableHosting(repo);
    const siteUrl = this.host.siteUrl(repo);
    this.log.info({ repo: name, siteUrl, hosting, commit: lastCommitId.slice(0, 7) }, 'publish complete');

    return { repositoryUrl: repo.htmlUrl, lastCommitId, siteUrl, hosting };
  }

  private async ensureRepository(name: string, targetId: TargetId): Promise<RemoteRepository> {
    try {
      const repo = await this.host.createRepository(name, `LLM generated code for task ${targetId}`);
      this.log.info({ repo: name }, 'created repository');
      return repo;
    } catch (err) {
      if (!(err instanceof RemoteHostError && err.reason === 'already-exists')) {
        throw new PublishError(`Failed to create repository ${name}: ${toError(err).message}`, { cause: err });
      }
    }

    try {
      const repo = await this.host.getRepository(name);
      this.log.info({ repo: name }, 'repository already exists, updating files');
      return repo;
    } catch (err) {
      throw new PublishError(`Failed to load existing repository ${name}: ${toError(err).message}`, { cause: err });
    }
  }

  // The host creates the branch on the first commit, so a missing ref is fine.
  private async checkBranch(repo: RemoteRepository): Promise<string | null> {
    try {
      const sha = await this.host.getBranchRef(repo, PUBLISH_BRANCH);
      if (sha === null) {
        this.log.debug({ repo: repo.name }, 'main branch missing, first commit will create it');
      }
      return sha;
    } catch (err) {
      this.log.debug({ repo: repo.name, err: toError(err) }, 'branch lookup failed');
      return null;
    }
  }

  /** Returns the new commit sha, or null when the remote file already holds `content`. */
  private async commitFile(
    repo: RemoteRepository,
    targetId: TargetId,
    path: string,
    content: string
  ): Promise<string | null> {
    let existing: RemoteFile | null;
    try {
      existing = await this.host.getFile(repo, path, PUBLISH_BRANCH);
    } catch (err) {
      throw new PublishError(`Failed to read ${path}: ${toError(err).message}`, { cause: err });
    }

    if (existing?.content === content) {
      this.log.info({ repo: repo.name, path }, 'unchanged, skipping');
      return null;
    }

    if (existing) {
      try {
        const sha = await this.host.updateFile(
          repo,
          { path, content, message: `Update ${path} for task ${targetId}`, branch: PUBLISH_BRANCH },
          existing.sha
        );
        this.log.info({ repo: repo.name, path, commit: sha.slice(0, 7) }, 'updated file');
        return sha;
      } catch (err) {
        if (err instanceof RemoteHostError && err.reason === 'conflict') {
          throw new PublishConflictError(path, { cause: err });
        }
        throw new PublishError(`Failed to update ${path}: ${toError(err).message}`, { cause: err });
      }
    }

    try {
      const sha = await this.host.createFile(repo, {
        path,
        content,
        message: `Initial commit of ${path} for task ${targetId}`,
        branch: PUBLISH_BRANCH
      });
      this.log.info({ repo: repo.name, path, commit: sha.slice(0, 7) }, 'committed file');
      return sha;
    } catch (err) {
      throw new PublishError(`Failed to create ${path}: ${toError(err).message}`, { cause: err });
    }
  }

  private async enableHosting(repo: RemoteRepository): Promise<HostingStatus> {
    try {
      const status = await this.host.enablePages(repo, { branch: PUBLISH_BRANCH, path: '/' });
      this.log.info({ repo: repo.name, status }, 'static hosting');
      return status;
    } catch (err) {
      this.log.warn({ repo: repo.name, err: toError(err) }, 'failed to enable static hosting');
      return 'unconfirmed';
    }
  }
}
