import type { ProxyCandidate } from '../proxy/proxyLink';
import type { CredentialStore } from './credentialStore';
import type { ErrorKind } from './errorKind';

export type StartOutcome =
  | { kind: 'authorized' }
  | { kind: 'needs-interactive-auth' }
  | { kind: 'error'; error: ErrorKind };

/**
 * The long-lived messaging-client connection. Implemented by the host application on top
 * of its protocol library; `start` runs that library's connect/login sequence.
 */
export interface SessionConnection {
  isConnected(): Promise<boolean>;
  start(credentials: CredentialStore): Promise<StartOutcome>;
  isAuthorized(): Promise<boolean>;
  /** Resolves when the connection drops; rejects with the transport or RPC error. */
  runUntilDisconnected(): Promise<void>;
}

export type SessionConnectionFactory = (endpoint: ProxyCandidate | null) => SessionConnection;
