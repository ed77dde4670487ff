import net from 'node:net';

import type { ProxyCandidate } from '../proxy/proxyLink';
import type { ConnectAttemptOptions, Connector, ConnectorLink } from './connector';

export interface TcpConnectorOptions {
  connectFn?(options: net.TcpNetConnectOpts): net.Socket;
}

/**
 * Reachability probe: a plain TCP connect to the relay endpoint. It does not speak the
 * relay protocol, so it proves the port accepts connections and nothing more.
 */
export class TcpConnector implements Connector {
  private readonly connectFn: (options: net.TcpNetConnectOpts) => net.Socket;

  public constructor(options: TcpConnectorOptions = {}) {
    this.connectFn = options.connectFn ?? ((connectOptions) => net.connect(connectOptions));
  }

  public attemptConnect(
    candidate: ProxyCandidate,
    options: ConnectAttemptOptions,
  ): Promise<ConnectorLink> {
    return new Promise((resolve, reject) => {
      if (options.signal.aborted) {
        reject(new Error(`Probe of ${candidate.host}:${candidate.port} cancelled`));
        return;
      }

      const socket = this.connectFn({ host: candidate.host, port: candidate.port });

      const cleanup = () => {
        socket.removeAllListeners();
        options.signal.removeEventListener('abort', onAbort);
      };
      const fail = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(error);
      };
      const onAbort = () => {
        fail(new Error(`Probe of ${candidate.host}:${candidate.port} cancelled`));
      };

      socket.setTimeout(options.timeoutMs);
      socket.once('connect', () => {
        cleanup();
        socket.setTimeout(0);
        // the link is about to be closed; a reset from the peer just ends it early
        socket.on('error', () => socket.destroy());
        resolve({
          disconnect: () => closeSocket(socket),
        });
      });
      socket.once('timeout', () => {
        fail(new Error(`Connection to ${candidate.host}:${candidate.port} timed out`));
      });
      socket.once('error', fail);
      options.signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function closeSocket(socket: net.Socket): Promise<void> {
  if (socket.destroyed) return Promise.resolve();

  return new Promise((resolve) => {
    socket.once('close', () => resolve());
    socket.destroy();
  });
}
