import { ensureAgentDirectories, resolveAgentPaths } from '../appPaths';
import type { AgentPaths } from '../appPaths';
import type { AgentConfig } from '../config';
import { FileCredentialStore } from '../connection/credentialStore';
import type { CredentialStore } from '../connection/credentialStore';
import type { SessionConnectionFactory } from '../connection/sessionConnection';
import { ConnectionSupervisor } from '../connection/supervisor';
import type { ConnectionState } from '../connection/supervisor';
import type { AgentLogger } from '../logger';
import type { Connector } from '../probe/connector';
import { selectWorking } from '../probe/probeScheduler';
import { TcpConnector } from '../probe/tcpConnector';
import { readProxyList } from '../proxy/proxyList';
import { endpointLabel } from '../proxy/proxyLink';
import type { ProxyCandidate } from '../proxy/proxyLink';
import { StatusStore, toStatusSnapshot } from '../state/statusStore';

export interface AgentCoreOptions {
  config: AgentConfig;
  logger: AgentLogger;
  paths?: AgentPaths;
  connectionFactory: SessionConnectionFactory;
  connector?: Connector;
  credentials?: CredentialStore;
  statusStore?: StatusStore;
  sleepFn?(ms: number, signal: AbortSignal): Promise<void>;
}

/**
 * Startup wiring: pick a relay from the list file, then hand the connection to the
 * supervisor. Probing finishes before supervision begins.
 */
export class AgentCore {
  private readonly config: AgentConfig;
  private readonly logger: AgentLogger;
  private readonly connectionFactory: SessionConnectionFactory;
  private readonly connector: Connector;
  private readonly credentials: CredentialStore;
  private readonly paths: AgentPaths;
  private readonly statusStore: StatusStore;
  private readonly sleepFn: ((ms: number, signal: AbortSignal) => Promise<void>) | undefined;
  private selectedEndpoint: ProxyCandidate | null = null;
  private supervisor: ConnectionSupervisor | null = null;
  private stopRequested = false;

  public constructor(options: AgentCoreOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.connectionFactory = options.connectionFactory;
    this.connector = options.connector ?? new TcpConnector();
    this.credentials = options.credentials ?? new FileCredentialStore(options.config.sessionFile);
    this.paths = options.paths ?? resolveAgentPaths();
    this.statusStore = options.statusStore ?? new StatusStore(this.paths.stateFile);
    this.sleepFn = options.sleepFn;
  }

  public getPaths(): AgentPaths {
    return this.paths;
  }

  public getSelectedEndpoint(): ProxyCandidate | null {
    return this.selectedEndpoint;
  }

  public isRunning(): boolean {
    return this.supervisor?.isRunning() ?? false;
  }

  public getConnectionState(): ConnectionState | null {
    return this.supervisor?.getState() ?? null;
  }

  public async selectEndpoint(): Promise<ProxyCandidate | null> {
    const { candidates, rejected } = await readProxyList(this.config.proxyFile);

    for (const item of rejected) {
      this.logger.warn({ line: item.line, reason: item.error.reason }, 'proxy line rejected');
    }

    this.logger.info(
      { file: this.config.proxyFile, candidates: candidates.length, rejected: rejected.length },
      'proxy list loaded',
    );

    const startedAt = Date.now();
    const winner = await selectWorking(candidates, {
      concurrency: this.config.probe.concurrency,
      timeoutMs: this.config.probe.timeoutMs,
      connector: this.connector,
      logger: this.logger,
      onResult: (result) => {
        this.logger.debug(
          { endpoint: endpointLabel(result.candidate), outcome: result.outcome, error: result.error },
          'probe finished',
        );
      },
    });

    this.selectedEndpoint = winner;
    if (winner) {
      this.logger.info(
        { endpoint: endpointLabel(winner), elapsedMs: Date.now() - startedAt },
        'proxy selected',
      );
    } else {
      this.logger.info('no working proxy, using direct connection');
    }

    return winner;
  }

  public async start(): Promise<void> {
    const endpoint = await this.selectEndpoint();
    if (this.stopRequested) return;

    await ensureAgentDirectories(this.paths);
    const supervisor = new ConnectionSupervisor({
      connection: this.connectionFactory(endpoint),
      credentials: this.credentials,
      endpoint,
      backoff: this.config.backoff,
      logger: this.logger,
      ...(this.sleepFn ? { sleepFn: this.sleepFn } : {}),
      onStateChange: (state) => this.statusStore.write(toStatusSnapshot(state, process.pid)),
    });

    this.supervisor = supervisor;
    await supervisor.run();
  }

  public stop(): void {
    this.stopRequested = true;
    this.supervisor?.stop();
  }
}
