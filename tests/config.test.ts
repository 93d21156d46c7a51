import { describe, it, expect } from 'vitest';
import { loadConfig, splitList } from '../src/core/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});
    expect(cfg.DEPLOYER_PORT).toBe(8000);
    expect(cfg.DEPLOYER_ALLOW_ORIGINS).toBe('*');
    expect(cfg.DEPLOYER_REPO_PREFIX).toBe('llm-app-');
    expect(cfg.CALLBACK_MAX_ATTEMPTS).toBe(6);
    expect(cfg.CALLBACK_BASE_DELAY_MS).toBe(1000);
    expect(cfg.CALLBACK_TIMEOUT_MS).toBe(600_000);
    expect(cfg.GITHUB_TOKEN).toBeUndefined();
    expect(cfg.LLM_API_KEY).toBeUndefined();
  });

  it('coerces numbers and treats blank credentials as unset', () => {
    const cfg = loadConfig({ DEPLOYER_PORT: '9001', GITHUB_TOKEN: '   ', LLM_API_KEY: ' test-key ' });
    expect(cfg.DEPLOYER_PORT).toBe(9001);
    expect(cfg.GITHUB_TOKEN).toBeUndefined();
    expect(cfg.LLM_API_KEY).toBe('test-key');
  });

  it('reports every invalid value', () => {
    expect(() => loadConfig({ DEPLOYER_PORT: 'abc', DEPLOYER_LOG_LEVEL: 'loud' })).toThrow(
      /Invalid configuration:\nDEPLOYER_PORT: .*\nDEPLOYER_LOG_LEVEL: /
    );
  });
});

describe('splitList', () => {
  it('trims entries and drops blanks', () => {
    expect(splitList(' a, b ,,c ,')).toEqual(['a', 'b', 'c']);
    expect(splitList(undefined)).toEqual([]);
    expect(splitList(' , ')).toEqual([]);
  });
});
