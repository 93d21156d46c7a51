import { fetch, type Dispatcher } from 'undici';

export interface ApiResponse {
  status: number;
  data: unknown;
}

/**
 * Thin HTTP client for a running deployer. Used by the CLI.
 */
export class DeployerClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly dispatcher?: Dispatcher
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  status(): Promise<ApiResponse> {
    return this.request('GET', '/');
  }

  submit(task: unknown): Promise<ApiResponse> {
    return this.request('POST', '/tasks', task);
  }

  private async request(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
      dispatcher: this.dispatcher
    });
    // Proxies in front of the server may answer with plain text.
    const data: unknown = await res.json().catch(() => ({}));
    return { status: res.status, data };
  }
}
