import type { CacheStats } from '../types/cache.js';
import type { DiagnosticsLogger } from '../types/logger.js';
import type { ProbeOutcome } from '../types/outcome.js';

import { ResolutionError } from '../errors.js';
import { silentLogger } from '../logging/logger.js';
import { lookupIPv4, type HostResolver } from '../probes/dns.js';
import { TtlCache } from '../utils/cache.js';
import type { NowFn } from '../utils/time.js';

const DEFAULT_TTL_MS = 300_000;

export type DnsMonitorOptions = {
  /** Performs the lookup on a cache miss. Defaults to IPv4 `dns.lookup`. */
  resolver?: HostResolver;

  /** How long a resolution is reused. Defaults to 5 minutes. */
  ttlMs?: number;

  logger?: DiagnosticsLogger;
  now?: NowFn;
};

/**
 * Hostname resolution with a TTL cache.
 *
 * Failed resolutions are never cached. Concurrent misses for the same name
 * share one lookup.
 */
export class DnsMonitor {
  private readonly resolver: HostResolver;
  private readonly logger: DiagnosticsLogger;
  private readonly cache: TtlCache<string, string[]>;
  private readonly inflight = new Map<string, Promise<ProbeOutcome<string[]>>>();

  constructor(options: DnsMonitorOptions = {}) {
    this.resolver = options.resolver ?? lookupIPv4;
    this.logger = options.logger ?? silentLogger;
    this.cache = new TtlCache({ ttlMs: options.ttlMs ?? DEFAULT_TTL_MS, now: options.now });
  }

  /**
   * Addresses for `hostname`, from cache while fresh.
   *
   * A `ResolutionError` is logged and returned as a `resolution-failed`
   * outcome; other errors propagate.
   */
  async resolve(hostname: string): Promise<ProbeOutcome<string[]>> {
    const cached = this.cache.get(hostname);
    if (cached) {
      this.logger.debug(`DNS cache hit for ${hostname}`);
      return { ok: true, value: [...cached], fromCache: true };
    }

    const running = this.inflight.get(hostname);
    if (running) return await running;

    const lookup = this.lookup(hostname).finally(() => {
      this.inflight.delete(hostname);
    });
    this.inflight.set(hostname, lookup);
    return await lookup;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  private async lookup(hostname: string): Promise<ProbeOutcome<string[]>> {
    let addresses: string[];
    try {
      addresses = await this.resolver(hostname);
    } catch (error) {
      if (!(error instanceof ResolutionError)) throw error;
      this.logger.error(`DNS resolution failed for ${hostname}: ${error.message}`);
      return { ok: false, reason: error.reason, message: error.message };
    }

    this.cache.set(hostname, addresses);
    return { ok: true, value: [...addresses], fromCache: false };
  }
}
