import type { ProxyCandidate } from '../proxy/proxyLink';

export interface ConnectAttemptOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

export interface ConnectorLink {
  disconnect(): Promise<void>;
}

/**
 * Opens a short-lived connection to a relay. Rejects on refusal, timeout or protocol
 * mismatch; should reject promptly once `signal` aborts.
 */
export interface Connector {
  attemptConnect(candidate: ProxyCandidate, options: ConnectAttemptOptions): Promise<ConnectorLink>;
}
