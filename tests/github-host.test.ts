import { describe, it, expect } from 'vitest';
import { Octokit } from '@octokit/rest';
import { GitHubRepositoryHost, createGitHubHost } from '../src/infra/github.js';
import { ConfigurationError, RemoteHostError } from '../src/core/errors.js';
import type { RemoteRepository } from '../src/core/types.js';
import { silentLog } from './fakes.js';

interface Route {
  method: string;
  path: string;
  status: number;
  body?: unknown;
}

interface SeenRequest {
  method: string;
  url: string;
  body: unknown;
}

/**
 * Stands in for the GitHub API: answers from a route table and records every
 * request. Unknown routes answer 404.
 */
function githubStub(routes: Route[]) {
  const seen: SeenRequest[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    const path = decodeURIComponent(url.pathname);
    seen.push({
      method,
      url: path + url.search,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    });
    const route = routes.find((r) => r.method === method && r.path === path);
    const status = route?.status ?? 404;
    const body = route ? route.body : { message: 'Not Found' };
    return new Response(status === 204 ? null : JSON.stringify(body ?? {}), {
      status,
      headers: { 'content-type': 'application/json; charset=utf-8' }
    });
  };
  const quiet = () => undefined;
  const octokit = new Octokit({
    auth: 'test-token',
    request: { fetch },
    log: { debug: quiet, info: quiet, warn: quiet, error: quiet }
  });
  return { host: new GitHubRepositoryHost(octokit, 'octocat', silentLog()), seen };
}

const repo: RemoteRepository = {
  owner: 'octocat',
  name: 'llm-app-demo-round-0',
  htmlUrl: 'https://github.com/octocat/llm-app-demo-round-0'
};

describe('GitHubRepositoryHost', () => {
  it('creates a public repository for the authenticated user', async () => {
    const { host, seen } = githubStub([
      {
        method: 'POST',
        path: '/user/repos',
        status: 201,
        body: { name: repo.name, html_url: repo.htmlUrl, owner: { login: 'octocat' } }
      }
    ]);

    const created = await host.createRepository(repo.name, 'LLM generated code for task demo-round-0');

    expect(created).toEqual(repo);
    expect(seen[0]).toEqual({
      method: 'POST',
      url: '/user/repos',
      body: { name: repo.name, description: 'LLM generated code for task demo-round-0', private: false }
    });
  });

  it('reports an existing repository name as already-exists', async () => {
    const { host } = githubStub([
      {
        method: 'POST',
        path: '/user/repos',
        status: 422,
        body: {
          message: 'Repository creation failed.',
          errors: [{ resource: 'Repository', code: 'custom', field: 'name', message: 'name already exists on this account' }]
        }
      }
    ]);

    const err = await host.createRepository(repo.name, 'd').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteHostError);
    expect(err).toMatchObject({ reason: 'already-exists', status: 422 });
  });

  it('reports other validation failures as rejected', async () => {
    const { host } = githubStub([
      {
        method: 'POST',
        path: '/user/repos',
        status: 422,
        body: { message: 'Validation Failed', errors: [{ message: 'name is too long' }] }
      }
    ]);

    await expect(host.createRepository(repo.name, 'd')).rejects.toMatchObject({ reason: 'rejected', status: 422 });
  });

  it('reads an existing repository under the configured account', async () => {
    const { host, seen } = githubStub([
      {
        method: 'GET',
        path: `/repos/octocat/${repo.name}`,
        status: 200,
        body: { name: repo.name, html_url: repo.htmlUrl, owner: { login: 'octocat' } }
      }
    ]);

    expect(await host.getRepository(repo.name)).toEqual(repo);
    expect(seen[0].url).toBe(`/repos/octocat/${repo.name}`);
  });

  it('returns null for a missing branch', async () => {
    const { host } = githubStub([]);
    expect(await host.getBranchRef(repo, 'main')).toBeNull();
  });

  it('returns the branch head sha', async () => {
    const { host } = githubStub([
      {
        method: 'GET',
        path: `/repos/octocat/${repo.name}/git/ref/heads/main`,
        status: 200,
        body: { ref: 'refs/heads/main', object: { sha: 'abc123', type: 'commit' } }
      }
    ]);
    expect(await host.getBranchRef(repo, 'main')).toBe('abc123');
  });

  it('reads file metadata on a ref and returns null when absent', async () => {
    const { host, seen } = githubStub([
      {
        method: 'GET',
        path: `/repos/octocat/${repo.name}/contents/index.html`,
        status: 200,
        body: { type: 'file', path: 'index.html', sha: 'blob-sha', content: '' }
      }
    ]);

    expect(await host.getFile(repo, 'index.html', 'main')).toEqual({ path: 'index.html', sha: 'blob-sha' });
    expect(seen[0].url).toBe(`/repos/octocat/${repo.name}/contents/index.html?ref=main`);
    expect(await host.getFile(repo, 'missing.js', 'main')).toBeNull();
  });

  it('decodes inline base64 content', async () => {
    const { host } = githubStub([
      {
        method: 'GET',
        path: `/repos/octocat/${repo.name}/contents/index.html`,
        status: 200,
        body: { type: 'file', path: 'index.html', sha: 'blob-sha', encoding: 'base64', content: 'PGh0bWw+\nPC9odG1sPg==\n' }
      }
    ]);

    expect(await host.getFile(repo, 'index.html', 'main')).toEqual({
      path: 'index.html',
      sha: 'blob-sha',
      content: '<html></html>'
    });
  });

  it('rejects a path that is a directory', async () => {
    const { host } = githubStub([
      {
        method: 'GET',
        path: `/repos/octocat/${repo.name}/contents/assets`,
        status: 200,
        body: [{ type: 'file', path: 'assets/a.png', sha: 's' }]
      }
    ]);

    await expect(host.getFile(repo, 'assets', 'main')).rejects.toMatchObject({ reason: 'rejected' });
  });

  it('creates a file with base64 content on the branch', async () => {
    const { host, seen } = githubStub([
      {
        method: 'PUT',
        path: `/repos/octocat/${repo.name}/contents/index.html`,
        status: 201,
        body: { content: { path: 'index.html', sha: 'blob-1' }, commit: { sha: 'commit-1' } }
      }
    ]);

    const sha = await host.createFile(repo, {
      path: 'index.html',
      content: 'hello',
      message: 'Initial commit of index.html for task demo-round-0',
      branch: 'main'
    });

    expect(sha).toBe('commit-1');
    expect(seen[0].body).toEqual({
      message: 'Initial commit of index.html for task demo-round-0',
      content: 'aGVsbG8=',
      branch: 'main'
    });
  });

  it('sends the expected sha on update and maps 409 to conflict', async () => {
    const { host, seen } = githubStub([
      {
        method: 'PUT',
        path: `/repos/octocat/${repo.name}/contents/index.html`,
        status: 409,
        body: { message: 'index.html does not match blob-old' }
      }
    ]);

    const err = await host
      .updateFile(repo, { path: 'index.html', content: 'hello', message: 'Update index.html', branch: 'main' }, 'blob-old')
      .catch((e: unknown) => e);

    expect(err).toMatchObject({ reason: 'conflict', status: 409 });
    expect(seen[0].body).toMatchObject({ sha: 'blob-old', content: 'aGVsbG8=' });
  });

  it('enables pages from the main branch root', async () => {
    const { host, seen } = githubStub([
      { method: 'POST', path: `/repos/octocat/${repo.name}/pages`, status: 201, body: { status: 'queued' } }
    ]);

    expect(await host.enablePages(repo, { branch: 'main', path: '/' })).toBe('enabled');
    expect(seen[0].body).toEqual({ source: { branch: 'main', path: '/' } });
  });

  it('treats a pages conflict as already enabled', async () => {
    const { host } = githubStub([
      { method: 'POST', path: `/repos/octocat/${repo.name}/pages`, status: 409, body: { message: 'GitHub Pages is already enabled.' } }
    ]);

    expect(await host.enablePages(repo, { branch: 'main', path: '/' })).toBe('already-enabled');
  });

  it('raises other pages failures', async () => {
    const { host } = githubStub([
      { method: 'POST', path: `/repos/octocat/${repo.name}/pages`, status: 422, body: { message: 'Invalid source' } }
    ]);

    await expect(host.enablePages(repo, { branch: 'main', path: '/' })).rejects.toMatchObject({
      reason: 'rejected',
      status: 422
    });
  });

  it('builds the site URL from the configured account', () => {
    const { host } = githubStub([]);
    expect(host.siteUrl(repo)).toBe('https://octocat.github.io/llm-app-demo-round-0/');
  });
});

describe('createGitHubHost', () => {
  it('requires a token and a username', () => {
    const base = { GITHUB_API_URL: 'https://api.github.com' };
    expect(() => createGitHubHost({ ...base, GITHUB_TOKEN: undefined, GITHUB_USERNAME: 'octocat' }, silentLog())).toThrow(
      ConfigurationError
    );
    expect(() => createGitHubHost({ ...base, GITHUB_TOKEN: 'test-token', GITHUB_USERNAME: undefined }, silentLog())).toThrow(
      'GitHub credentials (GITHUB_TOKEN or GITHUB_USERNAME) are not set'
    );
    expect(createGitHubHost({ ...base, GITHUB_TOKEN: 'test-token', GITHUB_USERNAME: 'octocat' }, silentLog()).owner).toBe(
      'octocat'
    );
  });
});
