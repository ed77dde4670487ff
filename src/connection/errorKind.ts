import { z } from 'zod';

export type ErrorKind =
  | { kind: 'transient-network'; message: string }
  | { kind: 'credential-revoked'; message: string }
  | { kind: 'rate-limited'; waitSeconds: number; message: string }
  | { kind: 'remote-protocol'; code: number; message: string }
  | { kind: 'unclassified'; message: string };

/** An error that already knows its classification, e.g. from a `start` outcome. */
export class ConnectionFailure extends Error {
  public constructor(public readonly errorKind: ErrorKind) {
    super(errorKind.message);
    this.name = 'ConnectionFailure';
  }
}

const TRANSIENT_SYSTEM_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENETDOWN',
  'ENETUNREACH',
  'EHOSTDOWN',
  'EHOSTUNREACH',
  'EADDRNOTAVAIL',
  'EAI_AGAIN',
  'ENOTFOUND',
]);

const TRANSIENT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

const REVOKED_RPC_MESSAGES = new Set(['AUTH_KEY_UNREGISTERED', 'SESSION_REVOKED']);

const FLOOD_WAIT_PATTERN = /^FLOOD_WAIT_(\d+)$/;

const MAX_CAUSE_DEPTH = 5;

const rpcErrorSchema = z.object({
  code: z.number().int(),
  errorMessage: z.string(),
  seconds: z.number().int().nonnegative().optional(),
});

const systemErrorSchema = z.object({
  code: z.string(),
  syscall: z.string().optional(),
});

export function classifyConnectionError(error: unknown): ErrorKind {
  return classify(error, 0);
}

export function describeErrorKind(errorKind: ErrorKind): string {
  if (errorKind.kind === 'rate-limited') return `rate-limited(${errorKind.waitSeconds}s)`;
  if (errorKind.kind === 'remote-protocol') return `remote-protocol(${errorKind.code})`;
  return errorKind.kind;
}

function classify(error: unknown, depth: number): ErrorKind {
  if (error instanceof ConnectionFailure) return error.errorKind;

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && TRANSIENT_ERROR_NAMES.has(error.name)) {
    return { kind: 'transient-network', message };
  }

  const rpc = rpcErrorSchema.safeParse(error);
  if (rpc.success) {
    return classifyRpcError(rpc.data, message);
  }

  const system = systemErrorSchema.safeParse(error);
  if (
    system.success &&
    (TRANSIENT_SYSTEM_CODES.has(system.data.code) || system.data.syscall !== undefined)
  ) {
    return { kind: 'transient-network', message };
  }

  if (error instanceof Error && error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    const inner = classify(error.cause, depth + 1);
    if (inner.kind !== 'unclassified') return inner;
  }

  return { kind: 'unclassified', message };
}

function classifyRpcError(rpc: z.infer<typeof rpcErrorSchema>, message: string): ErrorKind {
  if (REVOKED_RPC_MESSAGES.has(rpc.errorMessage)) {
    return { kind: 'credential-revoked', message };
  }

  const flood = FLOOD_WAIT_PATTERN.exec(rpc.errorMessage);
  if (flood?.[1] !== undefined) {
    return { kind: 'rate-limited', waitSeconds: Number(flood[1]), message };
  }

  if (rpc.code === 420 && rpc.seconds !== undefined) {
    return { kind: 'rate-limited', waitSeconds: rpc.seconds, message };
  }

  return { kind: 'remote-protocol', code: rpc.code, message };
}
