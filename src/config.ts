import dotenv from 'dotenv';
import { z } from 'zod';

import { AgentError } from './errors';

const configSchema = z
  .object({
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    PROXY_FILE: z.string().min(1).default('proxies.txt'),
    SESSION_FILE: z.string().min(1).optional(),
    PROBE_CONCURRENCY: z.coerce.number().int().positive().default(20),
    PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
    BACKOFF_FLOOR_MS: z.coerce.number().int().positive().default(1_000),
    BACKOFF_CEILING_MS: z.coerce.number().int().positive().default(300_000),
  })
  .refine((value) => value.BACKOFF_CEILING_MS >= value.BACKOFF_FLOOR_MS, {
    message: 'BACKOFF_CEILING_MS must not be lower than BACKOFF_FLOOR_MS',
    path: ['BACKOFF_CEILING_MS'],
  });

export interface AgentConfig {
  logLevel: z.infer<typeof configSchema>['LOG_LEVEL'];
  proxyFile: string;
  sessionFile: string;
  probe: {
    concurrency: number;
    timeoutMs: number;
  };
  backoff: {
    floorMs: number;
    ceilingMs: number;
  };
}

export function parseAgentConfig(
  source: Record<string, string | undefined>,
  defaults: { sessionFile: string },
): AgentConfig {
  const parsed = configSchema.safeParse(source);

  if (!parsed.success) {
    throw new AgentError({
      code: 'CONFIG_INVALID',
      message: 'Invalid environment variables',
      details: parsed.error.flatten().fieldErrors,
    });
  }

  const env = parsed.data;
  return {
    logLevel: env.LOG_LEVEL,
    proxyFile: env.PROXY_FILE,
    sessionFile: env.SESSION_FILE ?? defaults.sessionFile,
    probe: {
      concurrency: env.PROBE_CONCURRENCY,
      timeoutMs: env.PROBE_TIMEOUT_MS,
    },
    backoff: {
      floorMs: env.BACKOFF_FLOOR_MS,
      ceilingMs: env.BACKOFF_CEILING_MS,
    },
  };
}

export function loadAgentConfig(defaults: { sessionFile: string }): AgentConfig {
  dotenv.config();
  return parseAgentConfig(process.env, defaults);
}
