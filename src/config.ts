import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_INTERVAL_SECONDS, DEFAULT_TARGETS, MAX_INTERVAL_SECONDS } from './protocol';

const positiveInt = (name: string) =>
  z.coerce.number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

const envSchema = z.object({
  XDP_STATS_INTERVAL: positiveInt('XDP_STATS_INTERVAL')
    .max(MAX_INTERVAL_SECONDS, `XDP_STATS_INTERVAL must be at most ${MAX_INTERVAL_SECONDS}`)
    .default(DEFAULT_INTERVAL_SECONDS),
  XDP_STATS_TARGETS: positiveInt('XDP_STATS_TARGETS').default(DEFAULT_TARGETS),
  XDP_STATS_BPFTOOL: z.string().min(1, 'XDP_STATS_BPFTOOL must not be empty').default('bpftool'),
  XDP_STATS_PIN_DIR: z.string().min(1).optional(),
  XDP_STATS_TIMEOUT_MS: positiveInt('XDP_STATS_TIMEOUT_MS').optional(),
});

export interface StatsConfig {
  intervalSeconds: number;
  targets: number;
  bpftool: string;
  pinDir?: string;
  timeoutMs?: number;
}

/** Empty strings count as unset, like an `export FOO=` in a shell. */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StatsConfig {
  const result = envSchema.safeParse(withoutEmpty(env));

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Environment validation failed', issues);
  }

  const data = result.data;
  return {
    intervalSeconds: data.XDP_STATS_INTERVAL,
    targets: data.XDP_STATS_TARGETS,
    bpftool: data.XDP_STATS_BPFTOOL,
    pinDir: data.XDP_STATS_PIN_DIR,
    timeoutMs: data.XDP_STATS_TIMEOUT_MS,
  };
}
