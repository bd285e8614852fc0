import type { CacheStats } from '../types/cache.js';
import type { CertificateFetcher, CertificateInfo, ParsedCertificate } from '../types/certificate.js';
import type { DiagnosticsLogger } from '../types/logger.js';
import type { ProbeOutcome } from '../types/outcome.js';

import { describeCertificate } from '../certificates/info.js';
import { parseCertificate } from '../certificates/x509.js';
import { ProbeError, errorMessage } from '../errors.js';
import { silentLogger } from '../logging/logger.js';
import { fetchPeerCertificate } from '../probes/tls.js';
import { TtlCache } from '../utils/cache.js';
import { defaultNow, type NowFn } from '../utils/time.js';

const DEFAULT_PORT = 443;
const DEFAULT_TTL_MS = 3_600_000;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

export type CertificateMonitorOptions = {
  /** Performs the TLS handshake on a cache miss. Defaults to `node:tls`. */
  fetcher?: CertificateFetcher;

  /** How long a fetched certificate is reused. Defaults to 1 hour. */
  ttlMs?: number;

  /** Bound on connect plus handshake. Defaults to 10s. */
  handshakeTimeoutMs?: number;

  /**
   * Verify the peer chain and hostname. Defaults to true; turn off to inspect
   * self-signed or expired certificates.
   */
  verify?: boolean;

  logger?: DiagnosticsLogger;

  /** Clock for the cache TTL and for `daysUntilExpiry`. Defaults to `Date.now`. */
  now?: NowFn;
};

/**
 * TLS certificate inspection with a TTL cache keyed by `host:port`.
 *
 * The parsed certificate is cached, not the derived info: `daysUntilExpiry`
 * is recomputed on every read, cache hits included.
 */
export class CertificateMonitor {
  private readonly fetcher: CertificateFetcher;
  private readonly handshakeTimeoutMs: number;
  private readonly verify: boolean;
  private readonly logger: DiagnosticsLogger;
  private readonly now: NowFn;
  private readonly cache: TtlCache<string, ParsedCertificate>;
  private readonly inflight = new Map<string, Promise<ProbeOutcome<CertificateInfo>>>();

  constructor(options: CertificateMonitorOptions = {}) {
    this.fetcher = options.fetcher ?? fetchPeerCertificate;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.verify = options.verify ?? true;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? defaultNow;
    this.cache = new TtlCache({ ttlMs: options.ttlMs ?? DEFAULT_TTL_MS, now: this.now });
  }

  /**
   * Certificate details for `hostname:port`.
   *
   * A fresh cache entry is answered without opening a connection. On a miss,
   * every failure to fetch or parse is logged and returned as a failed
   * outcome; errors that are not probe errors count as `handshake-failed`.
   */
  async check(hostname: string, port = DEFAULT_PORT): Promise<ProbeOutcome<CertificateInfo>> {
    const key = `${hostname}:${port}`;

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug(`Certificate cache hit for ${key}`);
      return { ok: true, value: describeCertificate(cached, this.now()), fromCache: true };
    }

    const running = this.inflight.get(key);
    if (running) return await running;

    const pending = this.fetch(key, hostname, port).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, pending);
    return await pending;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  private async fetch(
    key: string,
    hostname: string,
    port: number,
  ): Promise<ProbeOutcome<CertificateInfo>> {
    let certificate: ParsedCertificate;
    try {
      const der = await this.fetcher({
        host: hostname,
        port,
        timeoutMs: this.handshakeTimeoutMs,
        verify: this.verify,
      });
      certificate = parseCertificate(der);
    } catch (error) {
      const reason = error instanceof ProbeError ? error.reason : 'handshake-failed';
      const message = errorMessage(error);
      this.logger.error(`SSL certificate check failed for ${hostname}: ${message}`);
      return { ok: false, reason, message };
    }

    this.cache.set(key, certificate);
    return { ok: true, value: describeCertificate(certificate, this.now()), fromCache: false };
  }
}
