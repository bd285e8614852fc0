import { isIP } from 'node:net';
import { connect } from 'node:tls';

import type { CertificateTarget } from '../types/certificate.js';

import { CertificateParseError, ConnectError, HandshakeError, ProbeTimeoutError } from '../errors.js';

// Socket errors raised before TLS starts; anything else is a handshake failure.
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/**
 * Default `CertificateFetcher`: run a TLS handshake with `node:tls` and return
 * the peer certificate in DER form.
 *
 * SNI is sent for hostnames (not for IP literals). One timer of `timeoutMs`
 * covers connect plus handshake, however the peer paces its bytes.
 */
export async function fetchPeerCertificate(target: CertificateTarget): Promise<Buffer> {
  const label = `${target.host}:${target.port}`;

  return await new Promise<Buffer>((resolve, reject) => {
    const socket = connect({
      host: target.host,
      port: target.port,
      servername: isIP(target.host) === 0 ? target.host : undefined,
      rejectUnauthorized: target.verify,
    });

    const deadline = setTimeout(() => {
      socket.destroy();
      reject(new ProbeTimeoutError(label, target.timeoutMs));
    }, target.timeoutMs);
    socket.once('close', () => {
      clearTimeout(deadline);
      reject(new HandshakeError(`${label} closed the connection before the handshake completed`));
    });

    socket.once('secureConnect', () => {
      clearTimeout(deadline);
      const certificate = socket.getPeerCertificate();
      socket.end();
      const raw: unknown = certificate.raw;
      if (raw instanceof Buffer && raw.length > 0) {
        resolve(raw);
      } else {
        reject(new CertificateParseError(`${label} did not present a certificate`));
      }
    });
    socket.once('error', (error) => {
      clearTimeout(deadline);
      socket.destroy();
      const code = errorCode(error);
      if (code && CONNECT_ERROR_CODES.has(code)) {
        reject(new ConnectError(`Failed to connect to ${label}: ${error.message}`, { cause: error }));
        return;
      }
      reject(new HandshakeError(`TLS handshake with ${label} failed: ${error.message}`, { cause: error }));
    });
  });
}
