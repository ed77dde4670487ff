import { readFile, writeFile } from 'node:fs/promises';

import { AgentError } from '../errors';
import { PROXY_LINK_PREFIX, parseProxyLink } from './proxyLink';
import type { ParseError, ProxyCandidate } from './proxyLink';

export interface RejectedLine {
  line: string;
  error: ParseError;
}

export interface ParsedProxyList {
  candidates: ProxyCandidate[];
  rejected: RejectedLine[];
}

const INVITE_LINK_PATTERN = /https:\/\/t\.me\/proxy\?server=[^&\s]*&port=\d+&secret=[^&\s]*/g;

export function parseProxyList(text: string): ParsedProxyList {
  const candidates: ProxyCandidate[] = [];
  const rejected: RejectedLine[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line.startsWith(PROXY_LINK_PREFIX)) continue;

    const result = parseProxyLink(line);
    if (result.ok) {
      candidates.push(result.candidate);
    } else {
      rejected.push({ line, error: result.error });
    }
  }

  return { candidates, rejected };
}

export async function readProxyList(filePath: string): Promise<ParsedProxyList> {
  const content = await readOptionalFile(filePath);
  return parseProxyList(content ?? '');
}

/** Pulls invite links out of free text such as a channel export, in order of appearance. */
export function extractProxyLinks(text: string): string[] {
  return Array.from(text.matchAll(INVITE_LINK_PATTERN), (match) => match[0]);
}

/** Writes `links` at the top of the list file, keeping whatever was there below them. */
export async function prependProxyLinks(filePath: string, links: readonly string[]): Promise<number> {
  if (links.length === 0) return 0;

  const existing = await readOptionalFile(filePath);
  const head = links.join('\n');
  const content = existing ? `${head}\n${existing}` : head;

  await writeFile(filePath, content, 'utf8');
  return links.length;
}

async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') return null;

    throw new AgentError({
      code: 'PROXY_LIST_UNREADABLE',
      message: `Unable to read ${filePath}`,
      details: { cause: err.message },
    });
  }
}
