import { connect } from 'node:net';

import type { ConnectTarget } from '../types/latency.js';

import { ConnectError, ProbeTimeoutError } from '../errors.js';

/**
 * Default `TcpConnector`: open a TCP connection with `node:net`, then close it.
 *
 * Resolves on `connect`; rejects with `ProbeTimeoutError` when the socket
 * stays idle past `timeoutMs`, and with `ConnectError` on any socket error.
 */
export async function tcpConnect(target: ConnectTarget): Promise<void> {
  const label = `${target.host}:${target.port}`;

  await new Promise<void>((resolve, reject) => {
    const socket = connect({ host: target.host, port: target.port });
    socket.setTimeout(target.timeoutMs);

    socket.once('connect', () => {
      socket.destroy();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new ProbeTimeoutError(label, target.timeoutMs));
    });
    socket.once('error', (error) => {
      socket.destroy();
      reject(new ConnectError(`Failed to connect to ${label}: ${error.message}`, { cause: error }));
    });
  });
}
