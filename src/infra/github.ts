import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { DeployerConfig } from '../core/config.js';
import { ConfigurationError, RemoteHostError, toError, type RemoteFailureReason } from '../core/errors.js';
import { pagesUrlFor } from '../core/target.js';
import type { FileWrite, PagesSource, RemoteFile, RemoteRepository, RepositoryHost } from '../core/types.js';

const GitHubErrorBody = z.object({
  message: z.string().optional(),
  errors: z
    .array(z.union([z.string(), z.object({ message: z.string().optional() }).passthrough()]))
    .optional()
});

function errorMessages(err: RequestError): string[] {
  const parsed = GitHubErrorBody.safeParse(err.response?.data);
  const messages = [err.message];
  if (parsed.success) {
    if (parsed.data.message) messages.push(parsed.data.message);
    for (const e of parsed.data.errors ?? []) {
      const msg = typeof e === 'string' ? e : e.message;
      if (msg) messages.push(msg);
    }
  }
  return messages;
}

/**
 * Maps an Octokit failure to a {@link RemoteHostError}. `classify` picks the
 * reason for statuses that mean something specific to the calling operation.
 */
function remoteError(
  operation: string,
  err: unknown,
  classify: (status: number, messages: string[]) => RemoteFailureReason = () => 'rejected'
): RemoteHostError {
  if (err instanceof RequestError) {
    const messages = errorMessages(err);
    const reason = classify(err.status, messages);
    return new RemoteHostError(`${operation} failed (${err.status}): ${err.message}`, reason, err.status, { cause: err });
  }
  return new RemoteHostError(`${operation} failed: ${toError(err).message}`, 'rejected', undefined, { cause: err });
}

const notFound = (status: number): RemoteFailureReason => (status === 404 ? 'not-found' : 'rejected');

/**
 * {@link RepositoryHost} backed by the GitHub REST API.
 */
export class GitHubRepositoryHost implements RepositoryHost {
  constructor(
    private readonly octokit: Octokit,
    public readonly owner: string,
    private readonly log: Logger
  ) {}

  async createRepository(name: string, description: string): Promise<RemoteRepository> {
    try {
      const { data } = await this.octokit.rest.repos.createForAuthenticatedUser({
        name,
        description,
        private: false
      });
      return { owner: data.owner.login, name: data.name, htmlUrl: data.html_url };
    } catch (err) {
      throw remoteError(`Create repository ${name}`, err, (status, messages) =>
        status === 422 && messages.some((m) => m.includes('name already exists')) ? 'already-exists' : 'rejected'
      );
    }
  }

  async getRepository(name: string): Promise<RemoteRepository> {
    try {
      const { data } = await this.octokit.rest.repos.get({ owner: this.owner, repo: name });
      return { owner: data.owner.login, name: data.name, htmlUrl: data.html_url };
    } catch (err) {
      throw remoteError(`Get repository ${this.owner}/${name}`, err, notFound);
    }
  }

  async getBranchRef(repo: RemoteRepository, branch: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.git.getRef({
        owner: repo.owner,
        repo: repo.name,
        ref: `heads/${branch}`
      });
      return data.object.sha;
    } catch (err) {
      // Empty repositories answer 409 here.
      if (err instanceof RequestError && (err.status === 404 || err.status === 409)) return null;
      throw remoteError(`Get ref heads/${branch}`, err);
    }
  }

  async getFile(repo: RemoteRepository, path: string, ref: string): Promise<RemoteFile | null> {
    const response = await this.octokit.rest.repos
      .getContent({ owner: repo.owner, repo: repo.name, path, ref })
      .catch((err: unknown) => {
        if (err instanceof RequestError && err.status === 404) return null;
        throw remoteError(`Get ${path}`, err);
      });
    if (!response) return null;

    const { data } = response;
    if (Array.isArray(data) || data.type !== 'file') {
      throw new RemoteHostError(`${path} exists but is not a file`, 'rejected');
    }
    const file: RemoteFile = { path: data.path, sha: data.sha };
    // Large files come back without inline content.
    if ('encoding' in data && data.encoding === 'base64' && 'content' in data && data.content) {
      file.content = Buffer.from(data.content, 'base64').toString('utf8');
    }
    return file;
  }

  async createFile(repo: RemoteRepository, write: FileWrite): Promise<string> {
    return this.putFile(repo, write);
  }

  async updateFile(repo: RemoteRepository, write: FileWrite, expectedSha: string): Promise<string> {
    return this.putFile(repo, write, expectedSha);
  }

  async enablePages(repo: RemoteRepository, source: PagesSource): Promise<'enabled' | 'already-enabled'> {
    try {
      await this.octokit.rest.repos.createPagesSite({
        owner: repo.owner,
        repo: repo.name,
        source
      });
      return 'enabled';
    } catch (err) {
      if (err instanceof RequestError && err.status === 409) return 'already-enabled';
      throw remoteError(`Enable pages for ${repo.name}`, err);
    }
  }

  siteUrl(repo: RemoteRepository): string {
    return pagesUrlFor(this.owner, repo.name);
  }

  private async putFile(repo: RemoteRepository, write: FileWrite, sha?: string): Promise<string> {
    let commitSha: string | undefined;
    try {
      const { data } = await this.octokit.rest.repos.createOrUpdateFileContents({
        owner: repo.owner,
        repo: repo.name,
        path: write.path,
        message: write.message,
        content: Buffer.from(write.content, 'utf8').toString('base64'),
        branch: write.branch,
        ...(sha ? { sha } : {})
      });
      commitSha = data.commit.sha;
    } catch (err) {
      // 409: sha does not match the branch head; 422 without a sha: file appeared meanwhile.
      throw remoteError(`Write ${write.path}`, err, (status) =>
        status === 409 || (status === 422 && sha === undefined) ? 'conflict' : 'rejected'
      );
    }

    if (!commitSha) {
      throw new RemoteHostError(`Write ${write.path} returned no commit`, 'rejected');
    }
    this.log.debug({ repo: repo.name, path: write.path, commit: commitSha }, 'file written');
    return commitSha;
  }
}

export function createOctokit(token: string, baseUrl: string, log: Logger): Octokit {
  return new Octokit({
    auth: token,
    baseUrl,
    userAgent: 'llm-app-deployer',
    log: {
      debug: (message: string) => log.debug(message),
      info: (message: string) => log.info(message),
      warn: (message: string) => log.warn(message),
      error: (message: string) => log.error(message)
    }
  });
}

/**
 * Builds the GitHub host from configuration.
 *
 * @throws {ConfigurationError} when GITHUB_TOKEN or GITHUB_USERNAME is unset
 */
export function createGitHubHost(
  cfg: Pick<DeployerConfig, 'GITHUB_TOKEN' | 'GITHUB_USERNAME' | 'GITHUB_API_URL'>,
  log: Logger
): GitHubRepositoryHost {
  if (!cfg.GITHUB_TOKEN || !cfg.GITHUB_USERNAME) {
    throw new ConfigurationError('GitHub credentials (GITHUB_TOKEN or GITHUB_USERNAME) are not set');
  }
  return new GitHubRepositoryHost(createOctokit(cfg.GITHUB_TOKEN, cfg.GITHUB_API_URL, log), cfg.GITHUB_USERNAME, log);
}
