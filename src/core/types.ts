export type TargetId = string;

export interface Attachment {
  name: string;
  url: string;
}

/** Inbound task submission, as received on `POST /tasks`. */
export interface TaskSubmission {
  email: string;
  secret: string;
  task: string;
  round: number;
  nonce: string;
  brief?: string;
  checks: string[];
  evaluation_url: string;
  attachments: Attachment[];
}

/** Relative file path → file content, in generation order. */
export type GeneratedFileSet = ReadonlyMap<string, string>;

/**
 * Outcome of the static hosting request. `unconfirmed` means the host refused
 * or could not be reached; the site URL is returned anyway.
 */
export type HostingStatus = 'enabled' | 'already-enabled' | 'unconfirmed';

export interface PublishResult {
  repositoryUrl: string;
  lastCommitId: string;
  siteUrl: string;
  hosting: HostingStatus;
}

/** Body posted to the submission's `evaluation_url`. */
export interface CallbackPayload {
  email: string;
  task: string;
  round: number;
  nonce: string;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
}

export interface CallbackOutcome {
  delivered: boolean;
  attempts: number;
  lastStatus?: number;
  lastError?: string;
}

/** Synchronous response to a successful submission. */
export interface TaskAcknowledgement {
  status: 'success';
  message: string;
  commit_url: string;
  evaluation_url: string;
  time_taken: string;
}

export interface ServiceStatus {
  status: 'ok';
  service: string;
  version: string;
  dependencies: {
    generator: boolean;
    publisher: boolean;
  };
}

// Ports to the external collaborators.

export interface AppGenerator {
  generate(submission: TaskSubmission): Promise<GeneratedFileSet>;
}

export interface AppPublisher {
  publish(targetId: TargetId, files: GeneratedFileSet): Promise<PublishResult>;
}

export interface ResultNotifier {
  notify(url: string, payload: CallbackPayload): Promise<CallbackOutcome>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmClient {
  complete(messages: ChatMessage[]): Promise<string>;
}

export interface RemoteRepository {
  owner: string;
  name: string;
  htmlUrl: string;
}

export interface RemoteFile {
  path: string;
  sha: string;
  /** Decoded text, when the host returned it inline. */
  content?: string;
}

export interface FileWrite {
  path: string;
  content: string;
  message: string;
  branch: string;
}

export interface PagesSource {
  branch: string;
  path: '/' | '/docs';
}

/**
 * Repository host operations the publisher needs. Adapters raise
 * `RemoteHostError` with a `reason` the publisher can branch on.
 */
export interface RepositoryHost {
  /** Account that owns created repositories. */
  readonly owner: string;
  createRepository(name: string, description: string): Promise<RemoteRepository>;
  getRepository(name: string): Promise<RemoteRepository>;
  /** Commit sha the branch points at, or null when the branch does not exist. */
  getBranchRef(repo: RemoteRepository, branch: string): Promise<string | null>;
  /** Current file metadata on `ref`, or null when the file does not exist. */
  getFile(repo: RemoteRepository, path: string, ref: string): Promise<RemoteFile | null>;
  /** Returns the new commit sha. */
  createFile(repo: RemoteRepository, write: FileWrite): Promise<string>;
  /** Compare-and-swap: `expectedSha` must be the file's current sha. Returns the new commit sha. */
  updateFile(repo: RemoteRepository, write: FileWrite, expectedSha: string): Promise<string>;
  enablePages(repo: RemoteRepository, source: PagesSource): Promise<'enabled' | 'already-enabled'>;
  siteUrl(repo: RemoteRepository): string;
}
