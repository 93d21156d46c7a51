import type { Logger } from 'pino';
import { z } from 'zod';
import { GenerationError, toError } from '../errors.js';
import type { Attachment, AppGenerator, ChatMessage, GeneratedFileSet, LlmClient, TaskSubmission } from '../types.js';
import { type BaseService, clipText } from './base.js';

export const SYSTEM_PROMPT = `You are an expert front-end developer. You build small, self-contained static web applications that run on GitHub Pages without a build step.

Rules:
- Use only HTML, CSS and browser JavaScript. Libraries may be loaded from a public CDN.
- The entry point is index.html at the repository root.
- Include a README.md that describes the app, how to use it, and how it works.
- Include a LICENSE file containing the MIT License text.
- Satisfy every listed requirement.

Reply with a single JSON object and nothing else, shaped as:
{"files": [{"path": "index.html", "content": "..."}]}`;

const TEXT_MEDIA_TYPES = [/^text\//, /^application\/json$/, /^image\/svg\+xml$/];

const FileListSchema = z.array(
  z.object({
    path: z.string(),
    content: z.string()
  })
);

const ReplySchema = z.object({
  files: z.union([FileListSchema, z.record(z.string(), z.string())])
});

interface DataUri {
  mediaType: string;
  text: string;
}

function percentDecode(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch (err) {
    // Unencoded text with a stray `%`.
    if (err instanceof URIError) return text;
    throw err;
  }
}

/**
 * Decodes a `data:` URI. Returns null for other URLs and for binary media
 * types.
 */
export function decodeTextDataUri(url: string): DataUri | null {
  const match = /^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s.exec(url);
  if (!match) return null;
  const mediaType = (match[1] || 'text/plain').toLowerCase();
  if (!TEXT_MEDIA_TYPES.some((re) => re.test(mediaType))) return null;
  const isBase64 = match[2].split(';').includes('base64');
  const text = isBase64
    ? Buffer.from(match[3], 'base64').toString('utf8')
    : percentDecode(match[3]);
  return { mediaType, text };
}

function describeAttachment(attachment: Attachment): string {
  const decoded = decodeTextDataUri(attachment.url);
  if (decoded) {
    return `### ${attachment.name} (${decoded.mediaType})\n\`\`\`\n${clipText(decoded.text)}\n\`\`\``;
  }
  if (attachment.url.startsWith('data:')) {
    return `### ${attachment.name}\nBinary attachment supplied as a data URI. Reference it as ./${attachment.name} and embed the data URI where the file is needed.`;
  }
  return `### ${attachment.name}\nAvailable at ${attachment.url}`;
}

/**
 * Builds the chat messages for one submission. The secret never enters the
 * prompt.
 */
export function buildMessages(submission: TaskSubmission): ChatMessage[] {
  const sections = [`# Task: ${submission.task}`, `Round: ${submission.round}`];

  if (submission.brief) {
    sections.push(`## Brief\n${submission.brief}`);
  }

  if (submission.checks.length > 0) {
    sections.push(
      `## Requirements\n${submission.checks.map((check, i) => `${i + 1}. ${check}`).join('\n')}`
    );
  }

  if (submission.attachments.length > 0) {
    sections.push(`## Attachments\n${submission.attachments.map(describeAttachment).join('\n\n')}`);
  }

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: sections.join('\n\n') }
  ];
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

export function normalizePath(raw: string): string {
  const path = raw.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
  if (!path) {
    throw new GenerationError('Generated file has an empty path');
  }
  if (path.split('/').some((segment) => segment === '..' || segment === '')) {
    throw new GenerationError(`Generated file has an invalid path: ${raw}`);
  }
  return path;
}

/**
 * Parses a model reply into an ordered file set.
 *
 * Accepts `{"files": [{path, content}]}` or `{"files": {path: content}}`,
 * optionally wrapped in a Markdown code fence.
 */
export function parseFileSet(reply: string): GeneratedFileSet {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(reply));
  } catch (err) {
    throw new GenerationError(`LLM reply is not valid JSON: ${toError(err).message}`, { cause: err });
  }

  const parsed = ReplySchema.safeParse(json);
  if (!parsed.success) {
    throw new GenerationError(`LLM reply has an unexpected shape: ${parsed.error.message}`);
  }

  const entries = Array.isArray(parsed.data.files)
    ? parsed.data.files.map((f): [string, string] => [f.path, f.content])
    : Object.entries(parsed.data.files);

  const files = new Map<string, string>();
  for (const [rawPath, content] of entries) {
    const path = normalizePath(rawPath);
    if (files.has(path)) {
      throw new GenerationError(`LLM reply lists ${path} more than once`);
    }
    files.set(path, content);
  }
  return files;
}

/**
 * Generation Adapter - one best-effort call to the language model per
 * submission. Retrying is left to the caller.
 */
export class GenerationAdapter implements BaseService, AppGenerator {
  constructor(
    private readonly client: LlmClient,
    public readonly log: Logger
  ) {}

  async generate(submission: TaskSubmission): Promise<GeneratedFileSet> {
    const messages = buildMessages(submission);
    this.log.debug({ task: submission.task, round: submission.round }, 'requesting generation');

    let reply: string;
    try {
      reply = await this.client.complete(messages);
    } catch (err) {
      throw new GenerationError(`LLM request failed: ${toError(err).message}`, { cause: err });
    }

    const files = parseFileSet(reply);
    if (files.size === 0) {
      throw new GenerationError('LLM failed to generate any files');
    }

    this.log.info({ task: submission.task, files: [...files.keys()] }, 'generated files');
    return files;
  }
}
