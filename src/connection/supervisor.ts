import { setTimeout as sleep } from 'node:timers/promises';

import { toErrorMessage } from '../errors';
import type { AgentLogger } from '../logger';
import { endpointLabel } from '../proxy/proxyLink';
import type { ProxyCandidate } from '../proxy/proxyLink';
import type { CredentialStore } from './credentialStore';
import { ConnectionFailure, classifyConnectionError, describeErrorKind } from './errorKind';
import type { ErrorKind } from './errorKind';
import type { SessionConnection } from './sessionConnection';

// timers fire immediately for anything longer
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type ConnectionPhase =
  | 'idle'
  | 'connecting'
  | 'authorizing'
  | 'running'
  | 'backing-off'
  | 'invalidating';

export interface ConnectionState {
  phase: ConnectionPhase;
  activeEndpoint: ProxyCandidate | null;
  backoffMs: number;
  lastError: ErrorKind | null;
}

export interface BackoffPolicy {
  floorMs: number;
  ceilingMs: number;
}

export interface ConnectionSupervisorOptions {
  connection: SessionConnection;
  credentials: CredentialStore;
  endpoint: ProxyCandidate | null;
  backoff: BackoffPolicy;
  logger: AgentLogger;
  classifyError?(error: unknown): ErrorKind;
  sleepFn?(ms: number, signal: AbortSignal): Promise<void>;
  onStateChange?(state: ConnectionState): void | Promise<void>;
}

/**
 * Keeps one session connection alive. Every failure loops back into a reconnect; the only
 * destructive step is deleting stored credentials when the remote side revokes them.
 *
 * Backoff is reset to the floor on success and on every classified failure. It only grows
 * when a restart right after credential invalidation fails too.
 */
export class ConnectionSupervisor {
  private readonly connection: SessionConnection;
  private readonly credentials: CredentialStore;
  private readonly backoff: BackoffPolicy;
  private readonly logger: AgentLogger;
  private readonly classifyError: (error: unknown) => ErrorKind;
  private readonly sleepFn: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly onStateChange: ((state: ConnectionState) => void | Promise<void>) | undefined;
  private readonly stopController = new AbortController();
  private state: ConnectionState;

  public constructor(options: ConnectionSupervisorOptions) {
    if (options.backoff.floorMs <= 0 || options.backoff.ceilingMs < options.backoff.floorMs) {
      throw new RangeError('Backoff floor must be positive and not above the ceiling');
    }

    this.connection = options.connection;
    this.credentials = options.credentials;
    this.backoff = options.backoff;
    this.logger = options.logger;
    this.classifyError = options.classifyError ?? classifyConnectionError;
    this.sleepFn = options.sleepFn ?? ((ms, signal) => sleep(ms, undefined, { signal }));
    this.onStateChange = options.onStateChange;
    this.state = {
      phase: 'idle',
      activeEndpoint: options.endpoint,
      backoffMs: options.backoff.floorMs,
      lastError: null,
    };
  }

  public getState(): ConnectionState {
    return { ...this.state };
  }

  public isRunning(): boolean {
    return this.state.phase === 'running';
  }

  /** Ends `run()` at the next loop boundary and cuts a pending backoff sleep short. */
  public stop(): void {
    this.stopController.abort();
  }

  public async run(): Promise<void> {
    this.logger.info(
      {
        endpoint: this.state.activeEndpoint ? endpointLabel(this.state.activeEndpoint) : 'direct',
      },
      'connection supervisor started',
    );

    while (!this.stopRequested()) {
      try {
        await this.connectOnce();
      } catch (error) {
        if (this.stopRequested()) break;
        await this.recover(this.classifyError(error));
      }
    }

    this.logger.info('connection supervisor stopped');
  }

  private stopRequested(): boolean {
    return this.stopController.signal.aborted;
  }

  private async connectOnce(): Promise<void> {
    if (!(await this.connection.isConnected())) {
      await this.update({ phase: 'connecting' });
      await this.startSession();
    }

    await this.update({ phase: 'authorizing' });
    if (!(await this.connection.isAuthorized())) {
      this.logger.warn('session not authorized, restarting sign-in');
      await this.update({ phase: 'connecting' });
      await this.startSession();

      if (!(await this.connection.isAuthorized())) {
        throw new ConnectionFailure({
          kind: 'unclassified',
          message: 'Authorization did not complete',
        });
      }
    }

    await this.update({ phase: 'running', backoffMs: this.backoff.floorMs, lastError: null });
    await this.connection.runUntilDisconnected();

    if (!this.stopRequested()) {
      this.logger.warn('connection dropped, reconnecting');
      await this.update({ phase: 'connecting' });
    }
  }

  private async startSession(): Promise<void> {
    const outcome = await this.connection.start(this.credentials);

    if (outcome.kind === 'error') {
      throw new ConnectionFailure(outcome.error);
    }

    if (outcome.kind === 'needs-interactive-auth') {
      this.logger.warn('interactive authorization required');
    }
  }

  private async recover(errorKind: ErrorKind): Promise<void> {
    switch (errorKind.kind) {
      case 'transient-network':
      case 'remote-protocol':
      case 'unclassified':
        this.logger.warn(
          { errorKind: describeErrorKind(errorKind), error: errorKind.message },
          'connection failed, retrying now',
        );
        await this.update({
          phase: 'connecting',
          backoffMs: this.backoff.floorMs,
          lastError: errorKind,
        });
        return;

      case 'rate-limited': {
        const delayMs = Math.max(errorKind.waitSeconds * 1_000, this.state.backoffMs);
        await this.update({ phase: 'backing-off', lastError: errorKind });
        await this.pause(delayMs);
        await this.update({ phase: 'connecting' });
        return;
      }

      case 'credential-revoked':
        await this.invalidateCredentials(errorKind);
        return;
    }
  }

  private async invalidateCredentials(errorKind: ErrorKind): Promise<void> {
    await this.update({ phase: 'invalidating', lastError: errorKind });

    try {
      if (await this.credentials.exists()) {
        await this.credentials.delete();
        this.logger.info('stored credentials deleted, sign-in required');
      }
    } catch (error) {
      this.logger.error({ error: toErrorMessage(error) }, 'failed to delete stored credentials');
    }

    await this.update({ backoffMs: this.backoff.floorMs });

    try {
      await this.startSession();
      this.logger.info('session restarted after credential invalidation');
    } catch (error) {
      const restartError = this.classifyError(error);
      this.logger.error(
        { errorKind: describeErrorKind(restartError), error: restartError.message },
        'restart after credential invalidation failed',
      );

      await this.update({ phase: 'backing-off', lastError: restartError });
      await this.pause(this.state.backoffMs);
      await this.update({
        backoffMs: Math.min(this.state.backoffMs * 2, this.backoff.ceilingMs),
      });
    }

    await this.update({ phase: 'connecting' });
  }

  private async pause(ms: number): Promise<void> {
    const delayMs = Math.min(ms, MAX_TIMER_DELAY_MS);
    this.logger.warn({ delayMs }, 'backing off');

    try {
      await this.sleepFn(delayMs, this.stopController.signal);
    } catch (error) {
      if (this.stopRequested()) return;
      this.logger.error({ error: toErrorMessage(error) }, 'backoff sleep failed');
    }
  }

  private async update(patch: Partial<Omit<ConnectionState, 'activeEndpoint'>>): Promise<void> {
    const previous = this.state;
    const next: ConnectionState = { ...previous, ...patch };

    if (
      next.phase === previous.phase &&
      next.backoffMs === previous.backoffMs &&
      next.lastError === previous.lastError
    ) {
      return;
    }

    this.state = next;
    this.logger.info(
      {
        from: previous.phase,
        to: next.phase,
        errorKind: next.lastError ? describeErrorKind(next.lastError) : null,
        backoffMs: next.backoffMs,
      },
      'connection phase changed',
    );

    if (!this.onStateChange) return;
    try {
      await this.onStateChange(this.getState());
    } catch (error) {
      this.logger.warn({ error: toErrorMessage(error) }, 'state listener failed');
    }
  }
}
