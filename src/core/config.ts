import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const EnvSchema = z.object({
  DEPLOYER_PORT: z.coerce.number().int().positive().default(8000),
  DEPLOYER_BIND: z.string().default('127.0.0.1'),
  DEPLOYER_RATE_LIMIT_RPM: z.coerce.number().int().positive().default(120),
  DEPLOYER_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  // Comma-separated. Empty means every submission is rejected.
  DEPLOYER_ACCEPTED_SECRETS: optionalString,
  DEPLOYER_SECRET: optionalString,
  // Comma-separated origins, '*' permits any caller. Restrict in production.
  DEPLOYER_ALLOW_ORIGINS: z.string().default('*'),
  DEPLOYER_REPO_PREFIX: z.string().min(1).default('llm-app-'),

  GITHUB_TOKEN: optionalString,
  GITHUB_USERNAME: optionalString,
  GITHUB_API_URL: z.string().url().default('https://api.github.com'),

  LLM_API_KEY: optionalString,
  LLM_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta/openai'),
  LLM_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),

  // The callback target may be slow; keep this well above the LLM timeout.
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  CALLBACK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(6),
  CALLBACK_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000)
});

export type DeployerConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): DeployerConfig {
  // Load dotenv before calling this function.
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}

/**
 * Splits a comma-separated setting, trimming entries and dropping blanks.
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
