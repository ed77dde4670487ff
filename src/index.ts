export { ensureAgentDirectories, resolveAgentPaths } from './appPaths';
export type { AgentPaths } from './appPaths';
export { AgentCore } from './core/agentCore';
export type { AgentCoreOptions } from './core/agentCore';
export { loadAgentConfig, parseAgentConfig } from './config';
export type { AgentConfig } from './config';
export { AgentError, formatAgentError } from './errors';
export type { AgentErrorCode } from './errors';
export { createAgentLogger } from './logger';
export type { AgentLogger } from './logger';
export {
  decodeSecret,
  endpointLabel,
  parseProxyLink,
  proxyLinkSchema,
  secretHex,
} from './proxy/proxyLink';
export type { ParseError, ParseErrorReason, ParseResult, ProxyCandidate } from './proxy/proxyLink';
export { extractProxyLinks, parseProxyList, prependProxyLinks, readProxyList } from './proxy/proxyList';
export { AdmissionGate } from './probe/admissionGate';
export type { ConnectAttemptOptions, Connector, ConnectorLink } from './probe/connector';
export { ProbeTimeoutError, selectWorking } from './probe/probeScheduler';
export type { ProbeOutcome, ProbeResult, SelectWorkingOptions } from './probe/probeScheduler';
export { TcpConnector } from './probe/tcpConnector';
export type { TcpConnectorOptions } from './probe/tcpConnector';
export { FileCredentialStore } from './connection/credentialStore';
export type { CredentialStore } from './connection/credentialStore';
export { ConnectionFailure, classifyConnectionError, describeErrorKind } from './connection/errorKind';
export type { ErrorKind } from './connection/errorKind';
export type {
  SessionConnection,
  SessionConnectionFactory,
  StartOutcome,
} from './connection/sessionConnection';
export { ConnectionSupervisor } from './connection/supervisor';
export type {
  BackoffPolicy,
  ConnectionPhase,
  ConnectionState,
  ConnectionSupervisorOptions,
} from './connection/supervisor';
export { StatusStore, toStatusSnapshot } from './state/statusStore';
export type { StatusSnapshot } from './state/statusStore';
