import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import envPaths from 'env-paths';

export interface AgentPaths {
  dataDir: string;
  logsDir: string;
  stateFile: string;
  sessionFile: string;
  agentLogFile: string;
}

export function resolveAgentPaths(): AgentPaths {
  const app = envPaths('relay-keeper', { suffix: '' });
  const dataDir = app.data;
  const logsDir = join(dataDir, 'logs');

  return {
    dataDir,
    logsDir,
    stateFile: join(dataDir, 'state.json'),
    sessionFile: join(dataDir, 'session'),
    agentLogFile: join(logsDir, 'agent.log'),
  };
}

export async function ensureAgentDirectories(paths: AgentPaths): Promise<void> {
  await Promise.all([
    mkdir(paths.dataDir, { recursive: true }),
    mkdir(paths.logsDir, { recursive: true }),
  ]);
}
