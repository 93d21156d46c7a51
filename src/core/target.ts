import type { TargetId } from './types.js';

/**
 * Stable key for a task/round pair. Resubmitting the same pair yields the same
 * id, so the publisher updates the existing repository instead of creating a
 * second one.
 *
 * @example
 * ```typescript
 * targetIdFor('Todo App', 0); // 'todo-app-round-0'
 * ```
 */
export function targetIdFor(task: string, round: number): TargetId {
  const slug = task.toLowerCase().replaceAll(' ', '-');
  return `${slug}-round-${round}`;
}

export function repositoryNameFor(prefix: string, targetId: TargetId): string {
  return `${prefix}${targetId}`.toLowerCase();
}

/** Project-site URL under the GitHub Pages convention. */
export function pagesUrlFor(owner: string, repositoryName: string): string {
  return `https://${owner.toLowerCase()}.github.io/${repositoryName}/`;
}
