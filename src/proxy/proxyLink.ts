import { z } from 'zod';

export interface ProxyCandidate {
  readonly host: string;
  readonly port: number;
  readonly secret: Buffer;
}

export type ParseErrorReason =
  | 'INVALID_URL'
  | 'WRONG_SHAPE'
  | 'MISSING_FIELD'
  | 'INVALID_PORT'
  | 'INVALID_SECRET';

export interface ParseError {
  reason: ParseErrorReason;
  message: string;
}

export type ParseResult = { ok: true; candidate: ProxyCandidate } | { ok: false; error: ParseError };

export const PROXY_LINK_PREFIX = 'https://t.me/proxy';

const HEX_SECRET_PREFIXES = ['dd', 'ee'] as const;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/**
 * Parses one relay-invite link (`https://t.me/proxy?server=…&port=…&secret=…`).
 *
 * Secrets that are pure hex and carry a `dd`/`ee` type prefix are hex-decoded; anything
 * else is treated as base64 (URL-safe or standard alphabet, padding optional).
 */
export function parseProxyLink(rawLine: string): ParseResult {
  let url: URL;
  try {
    url = new URL(rawLine.trim());
  } catch {
    return failure('INVALID_URL', 'Proxy link is not a valid URL');
  }

  if (
    url.protocol !== 'https:' ||
    url.host !== 't.me' ||
    url.pathname !== '/proxy' ||
    url.username ||
    url.password
  ) {
    return failure('WRONG_SHAPE', 'Proxy link must point to https://t.me/proxy');
  }

  const host = url.searchParams.get('server');
  const rawPort = url.searchParams.get('port');
  const rawSecret = url.searchParams.get('secret');

  if (!host) return missingField('server');
  if (!rawPort) return missingField('port');
  if (!rawSecret) return missingField('secret');

  const port = /^\d+$/.test(rawPort) ? Number(rawPort) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return failure('INVALID_PORT', `Proxy link port must be 1-65535, got ${rawPort}`);
  }

  const secret = decodeSecret(rawSecret);
  if (!secret) {
    return failure('INVALID_SECRET', 'Proxy link secret is neither prefixed hex nor base64');
  }

  return {
    ok: true,
    candidate: Object.freeze({ host, port, secret }),
  };
}

export function decodeSecret(encoded: string): Buffer | null {
  const isPrefixedHex =
    HEX_SECRET_PREFIXES.some((prefix) => encoded.startsWith(prefix)) && HEX_PATTERN.test(encoded);

  if (isPrefixedHex) {
    if (encoded.length % 2 !== 0) return null;
    return Buffer.from(encoded, 'hex');
  }

  // query values arrive decoded once; this catches padding that was encoded twice
  const normalized = encoded.replaceAll('%3D', '=');
  if (!BASE64_PATTERN.test(normalized)) return null;

  const body = normalized.replace(/=+$/, '');
  const padded = normalized.length !== body.length;
  if (body.length % 4 === 1) return null;
  if (padded && normalized.length % 4 !== 0) return null;

  const decoded = Buffer.from(body.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
  return decoded.length > 0 ? decoded : null;
}

export function secretHex(candidate: ProxyCandidate): string {
  return candidate.secret.toString('hex');
}

export function endpointLabel(candidate: ProxyCandidate): string {
  return `${candidate.host}:${candidate.port}`;
}

export const proxyLinkSchema = z.string().transform((value, context) => {
  const result = parseProxyLink(value);
  if (!result.ok) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: result.error.message,
      params: { reason: result.error.reason },
    });
    return z.NEVER;
  }

  return result.candidate;
});

function failure(reason: ParseErrorReason, message: string): ParseResult {
  return { ok: false, error: { reason, message } };
}

function missingField(key: string): ParseResult {
  return failure('MISSING_FIELD', `Proxy link is missing query param ${key}`);
}
