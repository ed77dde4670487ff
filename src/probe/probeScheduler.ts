import { toErrorMessage } from '../errors';
import type { AgentLogger } from '../logger';
import { endpointLabel } from '../proxy/proxyLink';
import type { ProxyCandidate } from '../proxy/proxyLink';
import { AdmissionGate } from './admissionGate';
import type { ReleaseSlot } from './admissionGate';
import type { Connector, ConnectorLink } from './connector';

export type ProbeOutcome = 'success' | 'failure' | 'cancelled';

export interface ProbeResult {
  candidate: ProxyCandidate;
  outcome: ProbeOutcome;
  error?: string;
}

export interface SelectWorkingOptions {
  concurrency: number;
  timeoutMs: number;
  connector: Connector;
  onResult?(result: ProbeResult): void;
  logger?: AgentLogger;
}

export class ProbeTimeoutError extends Error {
  public constructor(public readonly timeoutMs: number) {
    super(`Probe timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * Probes every candidate with at most `concurrency` attempts in flight and resolves with the
 * first one that connects, or `null` when none does.
 *
 * The winner is whichever probe connects first, not the earliest in input order. The
 * remaining probes are cancelled as soon as it connects, and the function only resolves
 * after all of them have settled. Disconnecting the winner is bounded by the same timeout.
 * Connectivity failures never reject.
 */
export async function selectWorking(
  candidates: readonly ProxyCandidate[],
  options: SelectWorkingOptions,
): Promise<ProxyCandidate | null> {
  if (candidates.length === 0) return null;

  const gate = new AdmissionGate(options.concurrency);
  const round = new AbortController();
  let winner: ProxyCandidate | null = null;

  const claim = (candidate: ProxyCandidate) => {
    if (winner !== null) return;
    winner = candidate;
    round.abort();
  };

  await Promise.all(
    candidates.map(async (candidate) => {
      const result = await probeCandidate(candidate, gate, round.signal, options, claim);
      reportResult(result, options);
    }),
  );

  return winner;
}

function reportResult(result: ProbeResult, options: SelectWorkingOptions): void {
  if (!options.onResult) return;
  try {
    options.onResult(result);
  } catch (error) {
    options.logger?.debug({ error: toErrorMessage(error) }, 'probe result listener failed');
  }
}

async function probeCandidate(
  candidate: ProxyCandidate,
  gate: AdmissionGate,
  roundSignal: AbortSignal,
  options: SelectWorkingOptions,
  claim: (candidate: ProxyCandidate) => void,
): Promise<ProbeResult> {
  let release: ReleaseSlot;
  try {
    release = await gate.acquire(roundSignal);
  } catch {
    return { candidate, outcome: 'cancelled' };
  }

  if (roundSignal.aborted) {
    release();
    return { candidate, outcome: 'cancelled' };
  }

  const attempt = new AbortController();
  const forwardAbort = () => attempt.abort(roundSignal.reason);
  roundSignal.addEventListener('abort', forwardAbort, { once: true });
  const timer = setTimeout(() => {
    attempt.abort(new ProbeTimeoutError(options.timeoutMs));
  }, options.timeoutMs);

  try {
    // registered before the connector's own abort listener, so timeouts report as such
    const aborted = rejectOnAbort(attempt.signal);
    const pending = options.connector.attemptConnect(candidate, {
      timeoutMs: options.timeoutMs,
      signal: attempt.signal,
    });

    let link: ConnectorLink;
    try {
      link = await Promise.race([pending, aborted]);
    } catch (error) {
      disposeLateLink(pending, options.logger);
      return {
        candidate,
        outcome: roundSignal.aborted ? 'cancelled' : 'failure',
        error: toErrorMessage(error),
      };
    }

    // from here on the round abort must not cut this probe's own disconnect short
    roundSignal.removeEventListener('abort', forwardAbort);
    if (roundSignal.aborted) {
      disposeLateLink(pending, options.logger);
      return { candidate, outcome: 'cancelled' };
    }
    claim(candidate);

    // the disconnect shares the attempt's timeout; an unfinished one completes in the background
    const closing = Promise.resolve()
      .then(() => link.disconnect())
      .catch((error: unknown) => {
        options.logger?.debug(
          { endpoint: endpointLabel(candidate), error: toErrorMessage(error) },
          'probe link failed to disconnect',
        );
      });
    await Promise.race([closing, aborted]).catch((error: unknown) => {
      options.logger?.debug(
        { endpoint: endpointLabel(candidate), error: toErrorMessage(error) },
        'probe link still closing',
      );
    });
    return { candidate, outcome: 'success' };
  } catch (error) {
    return { candidate, outcome: 'failure', error: toErrorMessage(error) };
  } finally {
    clearTimeout(timer);
    roundSignal.removeEventListener('abort', forwardAbort);
    release();
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    const fail = () => {
      const reason: unknown = signal.reason;
      reject(reason instanceof Error ? reason : new Error('Probe cancelled'));
    };

    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener('abort', fail, { once: true });
  });
}

// A connector that ignores its signal may still hand back a link after the probe gave up.
function disposeLateLink(pending: Promise<ConnectorLink>, logger: AgentLogger | undefined): void {
  void pending
    .then(
      (link) => link.disconnect(),
      () => undefined,
    )
    .catch((error: unknown) => {
      logger?.debug({ error: toErrorMessage(error) }, 'late probe link failed to disconnect');
    });
}
