import { describe, it, expect } from 'vitest';
import { pagesUrlFor, repositoryNameFor, targetIdFor } from '../src/core/target.js';

describe('target identifiers', () => {
  it('derives a deterministic slug from task and round', () => {
    expect(targetIdFor('Todo App', 0)).toBe('todo-app-round-0');
    expect(targetIdFor('Todo App', 0)).toBe(targetIdFor('Todo App', 0));
    expect(targetIdFor('Markdown  To HTML', 2)).toBe('markdown--to-html-round-2');
  });

  it('prefixes and lower-cases the repository name', () => {
    expect(repositoryNameFor('llm-app-', 'todo-app-round-0')).toBe('llm-app-todo-app-round-0');
    expect(repositoryNameFor('LLM-', 'x-round-1')).toBe('llm-x-round-1');
  });

  it('builds the project site URL', () => {
    expect(pagesUrlFor('OctoCat', 'llm-app-todo-app-round-0')).toBe(
      'https://octocat.github.io/llm-app-todo-app-round-0/'
    );
  });
});
