import { chmod, readFile, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { describeErrorKind } from '../connection/errorKind';
import type { ConnectionState } from '../connection/supervisor';
import { AgentError } from '../errors';
import { endpointLabel } from '../proxy/proxyLink';

const STATUS_VERSION = 1 as const;

const statusSnapshotSchema = z.object({
  version: z.literal(STATUS_VERSION),
  phase: z.enum(['idle', 'connecting', 'authorizing', 'running', 'backing-off', 'invalidating']),
  endpoint: z.string().nullable(),
  backoffMs: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
  pid: z.number().int().positive().nullable(),
  updatedAt: z.string(),
});

export type StatusSnapshot = z.infer<typeof statusSnapshotSchema>;

export function toStatusSnapshot(state: ConnectionState, pid: number | null): StatusSnapshot {
  return {
    version: STATUS_VERSION,
    phase: state.phase,
    endpoint: state.activeEndpoint ? endpointLabel(state.activeEndpoint) : null,
    backoffMs: state.backoffMs,
    lastError: state.lastError ? describeErrorKind(state.lastError) : null,
    pid,
    updatedAt: new Date().toISOString(),
  };
}

/** The supervisor's latest state on disk, for `status` calls from another process. */
export class StatusStore {
  public constructor(private readonly stateFilePath: string) {}

  public async read(): Promise<StatusSnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.stateFilePath, 'utf8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') return this.defaultSnapshot();
      throw new AgentError({
        code: 'STATUS_UNREADABLE',
        message: `Unable to read ${this.stateFilePath}`,
        details: { cause: err.message },
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new AgentError({
        code: 'STATUS_UNREADABLE',
        message: `${this.stateFilePath} is not valid JSON`,
      });
    }

    const parsed = statusSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new AgentError({
        code: 'STATUS_UNREADABLE',
        message: `${this.stateFilePath} has an unexpected shape`,
        details: parsed.error.flatten().fieldErrors,
      });
    }

    return parsed.data;
  }

  public async write(snapshot: StatusSnapshot): Promise<void> {
    await writeFile(this.stateFilePath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    if (process.platform !== 'win32') {
      await chmod(this.stateFilePath, 0o600);
    }
  }

  private defaultSnapshot(): StatusSnapshot {
    return {
      version: STATUS_VERSION,
      phase: 'idle',
      endpoint: null,
      backoffMs: 0,
      lastError: null,
      pid: null,
      updatedAt: new Date().toISOString(),
    };
  }
}
