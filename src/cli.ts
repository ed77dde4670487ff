#!/usr/bin/env node

import { readFile } from 'node:fs/promises';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { ensureAgentDirectories, resolveAgentPaths } from './appPaths';
import { loadAgentConfig } from './config';
import { AgentCore } from './core/agentCore';
import type { SessionConnection } from './connection/sessionConnection';
import { toErrorMessage } from './errors';
import { createAgentLogger } from './logger';
import { extractProxyLinks, prependProxyLinks } from './proxy/proxyList';
import { endpointLabel } from './proxy/proxyLink';
import { StatusStore } from './state/statusStore';

interface ExtractArgs {
  input: string;
  output: string;
}

interface ProbeArgs {
  file: string;
  concurrency: number;
  timeout: number;
}

async function main(): Promise<void> {
  const paths = resolveAgentPaths();
  await ensureAgentDirectories(paths);

  const config = loadAgentConfig({ sessionFile: paths.sessionFile });
  const logger = createAgentLogger(paths.agentLogFile, config.logLevel);
  const statusStore = new StatusStore(paths.stateFile);

  async function commandExtract(input: string, output: string): Promise<void> {
    const text = await readFile(input, 'utf8');
    const links = extractProxyLinks(text);

    if (links.length === 0) {
      console.log('No proxy links found');
      return;
    }

    const written = await prependProxyLinks(output, links);
    logger.info({ input, output, written }, 'proxy links extracted');
    console.log(`Found ${written} proxy links and saved them to ${output}`);
  }

  async function commandProbe(argv: ProbeArgs): Promise<void> {
    const core = new AgentCore({
      config: {
        ...config,
        proxyFile: argv.file,
        probe: {
          concurrency: argv.concurrency,
          timeoutMs: argv.timeout,
        },
      },
      logger,
      paths,
      statusStore,
      connectionFactory: probeOnlyConnection,
    });

    const winner = await core.selectEndpoint();
    console.log(winner ? endpointLabel(winner) : 'none');
  }

  async function commandStatus(): Promise<void> {
    const snapshot = await statusStore.read();
    console.log(JSON.stringify(snapshot, null, 2));
  }

  await yargs(hideBin(process.argv))
    .scriptName('relay-keeper')
    .strict()
    .command<ExtractArgs>(
      'extract',
      'Extract relay-invite links from a text dump into the proxy list',
      (builder) =>
        builder
          .option('input', {
            type: 'string',
            demandOption: true,
            describe: 'Text file to scan for links',
          })
          .option('output', {
            type: 'string',
            default: config.proxyFile,
            describe: 'Proxy list file to prepend the links to',
          }),
      async (argv) => {
        await commandExtract(argv.input, argv.output);
      },
    )
    .command<ProbeArgs>(
      'probe',
      'Probe the proxy list and print the first relay that answers',
      (builder) =>
        builder
          .option('file', {
            type: 'string',
            default: config.proxyFile,
            describe: 'Proxy list file',
          })
          .option('concurrency', {
            type: 'number',
            default: config.probe.concurrency,
            describe: 'Probes in flight at once',
          })
          .option('timeout', {
            type: 'number',
            default: config.probe.timeoutMs,
            describe: 'Per-probe timeout in milliseconds',
          }),
      async (argv) => {
        await commandProbe(argv);
      },
    )
    .command(
      'status',
      'Show the last recorded connection state',
      () => undefined,
      async () => {
        await commandStatus();
      },
    )
    .demandCommand(1)
    .fail((message: string | undefined, error: Error | undefined) => {
      const reason = message ?? toErrorMessage(error);
      if (reason) {
        console.error(reason);
      }
      process.exit(1);
    })
    .help()
    .parseAsync();
}

// `probe` never starts supervision, so the session connection is never created.
function probeOnlyConnection(): SessionConnection {
  throw new Error('The probe command does not open a session connection');
}

void main().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  process.exit(1);
});
